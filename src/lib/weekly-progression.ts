// Weekly Progression Engine
// Folds per-week rows into a running snapshot, one step per week in increasing order

import { z } from 'zod'
import { engineLog } from './engine-config'
import { TwinValidationError } from './errors'
import { relativeChangePercent } from './health-constants'
import { applyUpdates, parseDuration, type FieldUpdate, type TaggedValue } from './intervention-effects'
import {
  PARAMETER_CATEGORIES,
  getPanel,
  readNumber,
  resolveField,
  roundTo,
  type ParameterCategory,
  type ParameterSnapshot,
} from './parameter-snapshot'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface WeeklyRow {
  week: number
  /** Keyed by vocabulary field name */
  values: Readonly<Record<string, TaggedValue>>
}

export interface FieldChange {
  baseline: number
  current: number
  absoluteChange: number
  relativeChange: number
}

export type ChangesFromBaseline = Partial<Record<ParameterCategory, Record<string, FieldChange>>>

export interface WeekState {
  week: number
  snapshot: ParameterSnapshot
  changes: ChangesFromBaseline
}

const taggedValueSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('absolute'), value: z.number().finite() }),
  z.object({ kind: z.literal('delta'), value: z.number().finite() }),
  z.object({ kind: z.literal('label'), value: z.string() }),
])

const weeklyRowSchema = z.object({
  week: z.number().int().positive(),
  values: z.record(z.string(), taggedValueSchema),
})

// ─── Step ───────────────────────────────────────────────────────────────────

export function rowToUpdates(row: WeeklyRow): FieldUpdate[] {
  const updates: FieldUpdate[] = []
  for (const [name, change] of Object.entries(row.values)) {
    const ref = resolveField(name)
    if (!ref) {
      engineLog.warn(`Week ${row.week}: ignoring unknown field "${name}"`)
      continue
    }
    updates.push({ category: ref.category, field: ref.field, change })
  }
  return updates
}

/** Apply one week's row; the input snapshot is left untouched */
export function applyWeeklyRow(snapshot: ParameterSnapshot, row: WeeklyRow): ParameterSnapshot {
  return applyUpdates(snapshot, rowToUpdates(row))
}

/** Diff every numeric field present on both sides */
export function computeChanges(baseline: ParameterSnapshot, current: ParameterSnapshot): ChangesFromBaseline {
  const changes: ChangesFromBaseline = {}
  for (const category of PARAMETER_CATEGORIES) {
    const panel = getPanel(current, category)
    if (!panel) continue
    const diffs: Record<string, FieldChange> = {}
    for (const field of Object.keys(panel)) {
      const before = readNumber(baseline, category, field)
      const after = readNumber(current, category, field)
      if (before === null || after === null) continue
      diffs[field] = {
        baseline: before,
        current: after,
        absoluteChange: roundTo(after - before, 2),
        relativeChange: relativeChangePercent(after, before),
      }
    }
    if (Object.keys(diffs).length > 0) changes[category] = diffs
  }
  return changes
}

// ─── Progression ────────────────────────────────────────────────────────────

/**
 * One state per week 1..durationWeeks. Weeks without a row carry the previous
 * snapshot forward; when several rows share a week the first one wins.
 */
export function progressWeekly(
  baseline: ParameterSnapshot,
  rows: readonly WeeklyRow[],
  durationWeeks: number,
): WeekState[] {
  const duration = parseDuration(durationWeeks)
  const byWeek = new Map<number, WeeklyRow>()
  for (const row of rows) {
    const parsed = weeklyRowSchema.safeParse(row)
    if (!parsed.success) {
      throw TwinValidationError.fromZod('Invalid weekly row', parsed.error)
    }
    if (byWeek.has(parsed.data.week)) {
      engineLog.warn(`Duplicate row for week ${parsed.data.week}; keeping the first`)
      continue
    }
    if (parsed.data.week > duration) {
      engineLog.debug(`Row for week ${parsed.data.week} is beyond the ${duration}-week duration`)
    }
    byWeek.set(parsed.data.week, parsed.data)
  }

  const states: WeekState[] = []
  let current = baseline
  for (let week = 1; week <= duration; week++) {
    const row = byWeek.get(week)
    if (row) current = applyWeeklyRow(current, row)
    states.push({ week, snapshot: current, changes: computeChanges(baseline, current) })
  }
  return states
}

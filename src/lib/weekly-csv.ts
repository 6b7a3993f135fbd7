// Weekly CSV parsing
// Header row of vocabulary field names plus a week (or week_number) column

import { parse } from 'csv-parse/sync'
import { z } from 'zod'
import { engineLog } from './engine-config'
import { TwinValidationError } from './errors'
import type { TaggedValue } from './intervention-effects'
import { CATEGORICAL_FIELDS, isAllowedLabel, resolveField } from './parameter-snapshot'
import type { WeeklyRow } from './weekly-progression'

export type CellValue = number | boolean | string | null

export type WeeklyRecord = Readonly<Record<string, CellValue | undefined>>

const NUMERIC = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const SIGNED = /^[+-]/
const WEEK_COLUMNS = ['week', 'week_number']

const csvRecordsSchema = z.array(z.record(z.string(), z.string()))
const weekSchema = z.number({ invalid_type_error: 'week must be a number' }).int().positive()

// ─── Cells ──────────────────────────────────────────────────────────────────

/**
 * Blank → null, true/false → boolean, signed numbers stay strings (they are deltas),
 * unsigned numbers → number, anything else stays a string.
 */
export function coerceCell(raw: string): CellValue {
  const text = raw.trim()
  if (text === '') return null
  const lowered = text.toLowerCase()
  if (lowered === 'true') return true
  if (lowered === 'false') return false
  if (SIGNED.test(text)) return text
  if (NUMERIC.test(text)) return Number(text)
  return text
}

function parseDelta(text: string): number | null {
  const body = text.slice(1).trim()
  if (!NUMERIC.test(body)) return null
  const magnitude = Number(body)
  return text.startsWith('-') ? -magnitude : magnitude
}

function toTagged(field: string, value: CellValue, week: number): TaggedValue | null {
  if (value === null) return null
  if (typeof value === 'boolean') {
    engineLog.debug(`Week ${week}: ignoring boolean for ${field}`)
    return null
  }
  if (typeof value === 'number') return { kind: 'absolute', value }
  if (SIGNED.test(value)) {
    const delta = parseDelta(value)
    if (delta === null) {
      engineLog.warn(`Week ${week}: could not parse delta "${value}" for ${field}; leaving it unchanged`)
      return null
    }
    return { kind: 'delta', value: delta }
  }
  if (CATEGORICAL_FIELDS.has(field) && isAllowedLabel(field, value)) {
    return { kind: 'label', value }
  }
  engineLog.warn(`Week ${week}: ignoring value "${value}" for ${field}`)
  return null
}

// ─── Records ────────────────────────────────────────────────────────────────

function readWeek(record: WeeklyRecord): number {
  const raw = record.week ?? record.week_number
  const value = typeof raw === 'string' ? coerceCell(raw) : raw
  const result = weekSchema.safeParse(value)
  if (!result.success) {
    throw TwinValidationError.fromZod('Weekly row needs a positive integer week', result.error)
  }
  return result.data
}

export function toWeeklyRow(record: WeeklyRecord): WeeklyRow {
  const week = readWeek(record)
  const values: Record<string, TaggedValue> = {}
  for (const [column, value] of Object.entries(record)) {
    if (WEEK_COLUMNS.includes(column) || value === undefined) continue
    const ref = resolveField(column)
    if (!ref) {
      engineLog.warn(`Week ${week}: ignoring unknown column "${column}"`)
      continue
    }
    const tagged = toTagged(ref.field, value, week)
    if (tagged) values[ref.field] = tagged
  }
  return { week, values }
}

export function parseWeeklyRows(records: readonly WeeklyRecord[]): WeeklyRow[] {
  if (records.length === 0) {
    throw new TwinValidationError('Weekly data is empty')
  }
  return records.map(toWeeklyRow)
}

export function parseWeeklyCsv(text: string): WeeklyRow[] {
  let parsed: unknown
  try {
    parsed = parse(text, { columns: true, skip_empty_lines: true, trim: true })
  } catch (error) {
    if (error instanceof Error) {
      throw new TwinValidationError('Invalid weekly CSV', [error.message])
    }
    throw error
  }
  const records = csvRecordsSchema.safeParse(parsed)
  if (!records.success) {
    throw TwinValidationError.fromZod('Invalid weekly CSV', records.error)
  }
  return parseWeeklyRows(records.data.map(record => {
    const coerced: Record<string, CellValue> = {}
    for (const [column, raw] of Object.entries(record)) {
      coerced[column] = coerceCell(raw)
    }
    return coerced
  }))
}

// Digital Twin orchestration
// Profile → baseline, then intervention or weekly simulations with reports on both ends

import { generateBaseline } from './baseline-generator'
import { computeBmi } from './derived-metrics'
import { engineLog } from './engine-config'
import { TwinValidationError } from './errors'
import { parseDuration, projectIntervention } from './intervention-effects'
import { buildReport, type ScoredReport } from './lab-report'
import {
  PARAMETER_CATEGORIES,
  finalizeDraft,
  getPanel,
  readDraftNumber,
  setDraftValue,
  toDraft,
  type ParameterSnapshot,
} from './parameter-snapshot'
import type { RandomSource } from './random-source'
import { recommendForIntervention } from './simulation-recommendations'
import { getScenario, type Scenario } from './simulation-scenarios'
import { compareSnapshots } from './snapshot-comparison'
import { twinProfileSchema, type InterventionInput, type TwinProfile, type TwinProfileInput } from './validations'
import { parseWeeklyCsv } from './weekly-csv'
import { progressWeekly, type ChangesFromBaseline, type WeeklyRow } from './weekly-progression'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface DigitalTwin {
  profile: TwinProfile
  baseline: ParameterSnapshot
}

export interface SimulationInput {
  baseline: ParameterSnapshot
  intervention: InterventionInput
  durationWeeks: number
  now?: Date
}

export interface SimulationOutcome {
  durationWeeks: number
  intervention: InterventionInput
  projected: ParameterSnapshot
  baselineReport: ScoredReport
  projectedReport: ScoredReport
  improvements: string[]
  recommendations: string[]
}

export interface WeeklySimulationInput {
  baseline: ParameterSnapshot
  /** Parsed rows, or the raw CSV text */
  rows: readonly WeeklyRow[] | string
  durationWeeks: number
  now?: Date
}

export interface WeeklyProgressEntry {
  week: number
  snapshot: ParameterSnapshot
  report: ScoredReport
  changes: ChangesFromBaseline
}

export interface WeeklySimulationOutcome {
  durationWeeks: number
  progression: WeeklyProgressEntry[]
  baselineReport: ScoredReport
  finalReport: ScoredReport
  improvements: string[]
  recommendations: string[]
}

// ─── Initialization ─────────────────────────────────────────────────────────

/**
 * Generate a baseline for the profile, then overlay any caller-supplied panel values.
 * BMI is recomputed from height and weight unless the overrides set it explicitly.
 */
export function initializeTwin(input: TwinProfileInput, options: { random?: RandomSource } = {}): DigitalTwin {
  const parsed = twinProfileSchema.safeParse(input)
  if (!parsed.success) {
    throw TwinValidationError.fromZod('Invalid twin profile', parsed.error)
  }
  const profile = parsed.data
  const body = profile.heightCm !== undefined && profile.weightKg !== undefined
    ? { heightCm: profile.heightCm, weightKg: profile.weightKg }
    : undefined

  const generated = generateBaseline(profile.age, profile.gender, profile.conditions, {
    random: options.random,
    body,
  })
  const draft = toDraft(generated)
  if (!body) {
    if (profile.heightCm !== undefined) setDraftValue(draft, 'physical', 'height_cm', profile.heightCm)
    if (profile.weightKg !== undefined) setDraftValue(draft, 'physical', 'weight_kg', profile.weightKg)
  }

  let overridden = 0
  for (const category of PARAMETER_CATEGORIES) {
    const panel = getPanel(profile.overrides, category)
    if (!panel) continue
    for (const [field, value] of Object.entries(panel)) {
      if (value === undefined) continue
      setDraftValue(draft, category, field, value)
      overridden++
    }
  }

  if (profile.overrides.physical?.bmi === undefined) {
    const bmi = computeBmi(readDraftNumber(draft, 'physical', 'weight_kg'), readDraftNumber(draft, 'physical', 'height_cm'))
    if (bmi !== null) setDraftValue(draft, 'physical', 'bmi', bmi)
  }

  engineLog.debug(`Initialized twin with ${overridden} overridden fields`)
  return { profile, baseline: finalizeDraft(draft) }
}

// ─── Simulations ────────────────────────────────────────────────────────────

export function runSimulation(input: SimulationInput): SimulationOutcome {
  const now = input.now ?? new Date()
  const projected = projectIntervention(input.baseline, input.intervention, input.durationWeeks)
  return {
    durationWeeks: input.durationWeeks,
    intervention: input.intervention,
    projected,
    baselineReport: buildReport(input.baseline, { now }),
    projectedReport: buildReport(projected, { now }),
    improvements: compareSnapshots(input.baseline, projected),
    recommendations: recommendForIntervention(input.intervention),
  }
}

export function runScenario(
  baseline: ParameterSnapshot,
  scenario: Scenario | string,
  options: { now?: Date } = {},
): SimulationOutcome {
  const resolved = typeof scenario === 'string' ? getScenario(scenario) : scenario
  return runSimulation({
    baseline,
    intervention: resolved.interventions,
    durationWeeks: resolved.durationWeeks,
    now: options.now,
  })
}

export function runWeeklySimulation(input: WeeklySimulationInput): WeeklySimulationOutcome {
  const now = input.now ?? new Date()
  const duration = parseDuration(input.durationWeeks)
  const rows = typeof input.rows === 'string' ? parseWeeklyCsv(input.rows) : input.rows
  if (rows.length === 0) {
    throw new TwinValidationError('Weekly data is empty')
  }

  const progression = progressWeekly(input.baseline, rows, duration).map(state => ({
    ...state,
    report: buildReport(state.snapshot, { now }),
  }))
  const baselineReport = buildReport(input.baseline, { now })
  const last = progression[progression.length - 1]
  const finalSnapshot = last?.snapshot ?? input.baseline

  return {
    durationWeeks: duration,
    progression,
    baselineReport,
    finalReport: last?.report ?? baselineReport,
    improvements: compareSnapshots(input.baseline, finalSnapshot),
    recommendations: recommendForIntervention({}),
  }
}

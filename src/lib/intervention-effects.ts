// Intervention Effect Model
// Bounded, time-scaled projection of a baseline
//
// Every rule carries a coefficient (effect reached at 12 weeks) and a cap (largest
// possible effect). Each rule reads the ORIGINAL baseline value and contributes the
// difference to the running projection, so kinds that touch the same field add up
// instead of compounding.

import { computeBmi } from './derived-metrics'
import { engineLog } from './engine-config'
import { TwinValidationError } from './errors'
import {
  CATEGORICAL_FIELDS,
  finalizeDraft,
  isAllowedLabel,
  readDraftNumber,
  readNumber,
  roundTo,
  setDraftValue,
  toDraft,
  type ParameterCategory,
  type ParameterSnapshot,
} from './parameter-snapshot'
import {
  durationWeeksSchema,
  interventionSchema,
  type Intervention,
  type InterventionInput,
} from './validations'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface EffectRule {
  category: ParameterCategory
  field: string
  /** Signed effect at full time factor; negative lowers the value */
  coefficient: number
  /** Largest magnitude the effect may reach */
  cap: number
  /** Skip flooring to whole units (HbA1c) */
  continuous?: boolean
  /** Rule applies only when the baseline value exceeds this threshold */
  onlyAbove?: number
}

export type TaggedValue =
  | { kind: 'absolute'; value: number }
  | { kind: 'delta'; value: number }
  | { kind: 'label'; value: string }

export interface FieldUpdate {
  category: ParameterCategory
  field: string
  change: TaggedValue
}

// ─── Rule Tables ────────────────────────────────────────────────────────────

export const SATURATION_WEEKS = 12

const EXERCISE_INTENSITIES = ['moderate', 'vigorous']
const SLEEP_IMPROVEMENTS = ['moderate', 'significant']

const EXERCISE_RULES: readonly EffectRule[] = [
  { category: 'vitals', field: 'heart_rate', coefficient: -5, cap: 15 },
  { category: 'vitals', field: 'blood_pressure_systolic', coefficient: -8, cap: 20 },
  { category: 'vitals', field: 'blood_pressure_diastolic', coefficient: -5, cap: 12 },
  { category: 'lipids', field: 'hdl', coefficient: 5, cap: 15 },
  { category: 'lipids', field: 'triglycerides', coefficient: -20, cap: 50 },
  { category: 'metabolic', field: 'glucose_fasting', coefficient: -8, cap: 20 },
  { category: 'metabolic', field: 'hba1c', coefficient: -0.3, cap: 0.8, continuous: true, onlyAbove: 5.7 },
]

const DIET_RULES: Readonly<Record<string, readonly EffectRule[]>> = {
  low_carb: [
    { category: 'metabolic', field: 'glucose_fasting', coefficient: -10, cap: 25 },
    { category: 'lipids', field: 'triglycerides', coefficient: -25, cap: 60 },
  ],
  mediterranean: [
    { category: 'lipids', field: 'ldl', coefficient: -15, cap: 35 },
    { category: 'lipids', field: 'hdl', coefficient: 8, cap: 20 },
  ],
  low_sodium: [
    { category: 'vitals', field: 'blood_pressure_systolic', coefficient: -10, cap: 25 },
    { category: 'vitals', field: 'blood_pressure_diastolic', coefficient: -6, cap: 15 },
  ],
}

/** First class whose pattern appears in the lowercased drug name wins */
const MEDICATION_RULES: ReadonlyArray<{ drugClass: string; patterns: readonly string[]; rules: readonly EffectRule[] }> = [
  {
    drugClass: 'statin',
    patterns: ['statin'],
    rules: [
      { category: 'lipids', field: 'ldl', coefficient: -30, cap: 70 },
      { category: 'lipids', field: 'total_cholesterol', coefficient: -25, cap: 60 },
    ],
  },
  {
    drugClass: 'ace_inhibitor',
    patterns: ['ace_inhibitor', 'ace inhibitor', 'arb'],
    rules: [
      { category: 'vitals', field: 'blood_pressure_systolic', coefficient: -15, cap: 35 },
      { category: 'vitals', field: 'blood_pressure_diastolic', coefficient: -8, cap: 20 },
    ],
  },
  {
    drugClass: 'metformin',
    patterns: ['metformin'],
    rules: [
      { category: 'metabolic', field: 'glucose_fasting', coefficient: -20, cap: 45 },
      { category: 'metabolic', field: 'hba1c', coefficient: -0.8, cap: 1.5, continuous: true, onlyAbove: 5.7 },
    ],
  },
]

const SLEEP_RULES: readonly EffectRule[] = [
  { category: 'vitals', field: 'blood_pressure_systolic', coefficient: -5, cap: 12 },
  { category: 'lifestyle', field: 'stress_level', coefficient: -2, cap: 5 },
]

// ─── Primitives ─────────────────────────────────────────────────────────────

export function timeFactor(durationWeeks: number): number {
  return Math.min(durationWeeks / SATURATION_WEEKS, 1)
}

/** Value the rule would produce from the baseline alone */
export function applyRule(baselineValue: number, rule: EffectRule, factor: number): number {
  const raw = Math.abs(rule.coefficient) * factor
  const step = rule.continuous ? raw : Math.floor(raw)
  const next = rule.coefficient < 0
    ? Math.max(baselineValue - step, baselineValue - rule.cap)
    : Math.min(baselineValue + step, baselineValue + rule.cap)
  return rule.continuous ? roundTo(next, 2) : next
}

export function matchMedicationClass(name: string): string | null {
  const lowered = name.toLowerCase()
  return MEDICATION_RULES.find(m => m.patterns.some(p => lowered.includes(p)))?.drugClass ?? null
}

/** Rules triggered by each present kind, in application order */
export function rulesForIntervention(intervention: Intervention): EffectRule[] {
  const rules: EffectRule[] = []
  if (intervention.exercise && EXERCISE_INTENSITIES.includes(intervention.exercise.intensity)) {
    rules.push(...EXERCISE_RULES)
  }
  if (intervention.diet) {
    rules.push(...(DIET_RULES[intervention.diet.type] ?? []))
  }
  if (intervention.medication) {
    const drugClass = matchMedicationClass(intervention.medication.name)
    rules.push(...(MEDICATION_RULES.find(m => m.drugClass === drugClass)?.rules ?? []))
  }
  if (intervention.sleep && SLEEP_IMPROVEMENTS.includes(intervention.sleep.improvement)) {
    rules.push(...SLEEP_RULES)
  }
  return rules
}

/**
 * Apply tagged updates to a copy of the snapshot. Absolute values replace, deltas add to
 * the current value (0 when absent), labels replace an enumeration. BMI is recomputed
 * when weight or height was touched.
 */
export function applyUpdates(snapshot: ParameterSnapshot, updates: readonly FieldUpdate[]): ParameterSnapshot {
  const draft = toDraft(snapshot)
  let bodyChanged = false

  for (const { category, field, change } of updates) {
    const categorical = CATEGORICAL_FIELDS.has(field)
    if (change.kind === 'label') {
      if (!categorical || !isAllowedLabel(field, change.value)) {
        engineLog.warn(`Ignoring label "${change.value}" for ${category}.${field}`)
        continue
      }
      setDraftValue(draft, category, field, change.value)
      continue
    }
    if (categorical) {
      engineLog.warn(`Ignoring numeric value for categorical field ${category}.${field}`)
      continue
    }
    const next = change.kind === 'absolute'
      ? change.value
      : roundTo((readDraftNumber(draft, category, field) ?? 0) + change.value, 4)
    setDraftValue(draft, category, field, next)
    if (category === 'physical' && (field === 'weight_kg' || field === 'height_cm')) {
      bodyChanged = true
    }
  }

  if (bodyChanged) {
    const bmi = computeBmi(readDraftNumber(draft, 'physical', 'weight_kg'), readDraftNumber(draft, 'physical', 'height_cm'))
    if (bmi !== null) setDraftValue(draft, 'physical', 'bmi', bmi)
  }
  return finalizeDraft(draft)
}

// ─── Projection ─────────────────────────────────────────────────────────────

export function parseIntervention(input: InterventionInput): Intervention {
  const result = interventionSchema.safeParse(input)
  if (!result.success) {
    throw TwinValidationError.fromZod('Invalid intervention', result.error)
  }
  return result.data
}

export function parseDuration(durationWeeks: number): number {
  const result = durationWeeksSchema.safeParse(durationWeeks)
  if (!result.success) {
    throw TwinValidationError.fromZod('Invalid duration', result.error)
  }
  return result.data
}

/**
 * Project the baseline under the intervention after `durationWeeks`. Fields missing
 * from the baseline are left untouched.
 */
export function projectIntervention(
  baseline: ParameterSnapshot,
  intervention: InterventionInput,
  durationWeeks: number,
): ParameterSnapshot {
  const parsed = parseIntervention(intervention)
  const factor = timeFactor(parseDuration(durationWeeks))
  const updates: FieldUpdate[] = []

  for (const rule of rulesForIntervention(parsed)) {
    const base = readNumber(baseline, rule.category, rule.field)
    if (base === null) continue
    if (rule.onlyAbove !== undefined && !(base > rule.onlyAbove)) continue
    const delta = applyRule(base, rule, factor) - base
    if (delta === 0) continue
    updates.push({ category: rule.category, field: rule.field, change: { kind: 'delta', value: delta } })
  }

  engineLog.debug(`Projected ${updates.length} field changes over ${durationWeeks} weeks`)
  return applyUpdates(baseline, updates)
}

// Baseline Generator
// Randomized starting snapshot from demographics and conditions
// Each field is drawn uniformly from its healthy interval (data/baseline-intervals.json),
// then condition overrides replace the affected fields with worse-skewed intervals

import { z } from 'zod'
import intervalTable from './data/baseline-intervals.json'
import { computeBmi } from './derived-metrics'
import { engineLog } from './engine-config'
import { TwinValidationError } from './errors'
import {
  ALCOHOL_LEVELS,
  CATEGORY_FIELDS,
  GENDERS,
  PARAMETER_CATEGORIES,
  SMOKING_STATUSES,
  finalizeDraft,
  setDraftValue,
  type Gender,
  type ParameterCategory,
  type ParameterSnapshot,
  type SnapshotDraft,
} from './parameter-snapshot'
import { randomChoice, randomInt, randomUniform, systemRandom, type RandomSource } from './random-source'

// ─── Interval Table ─────────────────────────────────────────────────────────

const drawIntervalSchema = z.object({
  min: z.number(),
  max: z.number(),
  decimals: z.number().int().min(0).max(4),
}).refine(i => i.min <= i.max, { message: 'min must not exceed max' })

const fieldIntervalSchema = z.union([
  drawIntervalSchema,
  z.object({ M: drawIntervalSchema, F: drawIntervalSchema }),
])

const intervalTableSchema = z.record(z.string(), z.record(z.string(), fieldIntervalSchema))

export type DrawInterval = z.infer<typeof drawIntervalSchema>
type FieldInterval = z.infer<typeof fieldIntervalSchema>

interface BaselineField {
  category: ParameterCategory
  field: string
  interval: FieldInterval
}

function loadIntervals(): BaselineField[] {
  const parsed = intervalTableSchema.safeParse(intervalTable)
  if (!parsed.success) {
    throw TwinValidationError.fromZod('Invalid baseline interval table', parsed.error)
  }
  const fields: BaselineField[] = []
  for (const category of PARAMETER_CATEGORIES) {
    const known = new Set<string>(CATEGORY_FIELDS[category])
    for (const [field, interval] of Object.entries(parsed.data[category] ?? {})) {
      if (!known.has(field)) {
        throw new TwinValidationError('Invalid baseline interval table', [`${category}.${field}: not in vocabulary`])
      }
      fields.push({ category, field, interval })
    }
  }
  return fields
}

const BASELINE_FIELDS = loadIntervals()

// ─── Condition Overrides ────────────────────────────────────────────────────

interface ConditionOverride {
  category: ParameterCategory
  field: string
  interval: DrawInterval
}

/** Applied in this order after the base draw; later entries win on overlapping fields */
export const CONDITION_OVERRIDES: ReadonlyArray<{ condition: string; overrides: readonly ConditionOverride[] }> = [
  {
    condition: 'diabetes',
    overrides: [
      { category: 'metabolic', field: 'glucose_fasting', interval: { min: 126, max: 200, decimals: 0 } },
      { category: 'metabolic', field: 'glucose_random', interval: { min: 200, max: 300, decimals: 0 } },
      { category: 'metabolic', field: 'hba1c', interval: { min: 6.5, max: 9.0, decimals: 1 } },
    ],
  },
  {
    condition: 'hypertension',
    overrides: [
      { category: 'vitals', field: 'blood_pressure_systolic', interval: { min: 140, max: 180, decimals: 0 } },
      { category: 'vitals', field: 'blood_pressure_diastolic', interval: { min: 90, max: 110, decimals: 0 } },
    ],
  },
  {
    condition: 'cardiovascular_disease',
    overrides: [
      { category: 'vitals', field: 'heart_rate', interval: { min: 70, max: 110, decimals: 0 } },
      { category: 'lipids', field: 'ldl', interval: { min: 100, max: 160, decimals: 0 } },
    ],
  },
  {
    condition: 'kidney_disease',
    overrides: [
      { category: 'metabolic', field: 'creatinine', interval: { min: 1.3, max: 3.0, decimals: 2 } },
      { category: 'metabolic', field: 'bun', interval: { min: 20, max: 40, decimals: 0 } },
    ],
  },
]

const KNOWN_CONDITIONS = new Set(CONDITION_OVERRIDES.map(c => c.condition))

// ─── Generation ─────────────────────────────────────────────────────────────

export interface BodyMeasurements {
  heightCm: number
  weightKg: number
}

export interface BaselineOptions {
  random?: RandomSource
  /** Adds a physical panel with BMI */
  body?: BodyMeasurements
}

const baselineInputSchema = z.object({
  age: z.number().int().min(0).max(130),
  gender: z.enum(GENDERS),
  conditions: z.array(z.string()),
  body: z.object({
    heightCm: z.number().positive(),
    weightKg: z.number().positive(),
  }).optional(),
})

function draw(source: RandomSource, interval: DrawInterval): number {
  return interval.decimals === 0
    ? randomInt(source, interval.min, interval.max)
    : randomUniform(source, interval.min, interval.max, interval.decimals)
}

function intervalFor(interval: FieldInterval, gender: Gender): DrawInterval {
  return 'min' in interval ? interval : interval[gender]
}

/**
 * Draw a complete snapshot for the given demographics. Condition tags are matched
 * case-sensitively; unknown tags have no effect.
 */
export function generateBaseline(
  age: number,
  gender: string,
  conditions: Iterable<string> = [],
  options: BaselineOptions = {},
): ParameterSnapshot {
  const input = baselineInputSchema.safeParse({ age, gender, conditions: [...conditions], body: options.body })
  if (!input.success) {
    throw TwinValidationError.fromZod('Invalid baseline demographics', input.error)
  }
  const source = options.random ?? systemRandom
  const tags = new Set(input.data.conditions)
  const draft: SnapshotDraft = {}

  for (const { category, field, interval } of BASELINE_FIELDS) {
    setDraftValue(draft, category, field, draw(source, intervalFor(interval, input.data.gender)))
  }
  setDraftValue(draft, 'lifestyle', 'smoking_status', randomChoice(source, SMOKING_STATUSES))
  setDraftValue(draft, 'lifestyle', 'alcohol_consumption', randomChoice(source, ALCOHOL_LEVELS))

  for (const { condition, overrides } of CONDITION_OVERRIDES) {
    if (!tags.has(condition)) continue
    for (const { category, field, interval } of overrides) {
      setDraftValue(draft, category, field, draw(source, interval))
    }
  }

  const unknown = [...tags].filter(tag => !KNOWN_CONDITIONS.has(tag))
  if (unknown.length > 0) {
    engineLog.debug(`Ignoring unknown condition tags: ${unknown.join(', ')}`)
  }

  const body = input.data.body
  if (body) {
    setDraftValue(draft, 'physical', 'height_cm', body.heightCm)
    setDraftValue(draft, 'physical', 'weight_kg', body.weightKg)
    setDraftValue(draft, 'physical', 'bmi', computeBmi(body.weightKg, body.heightCm))
  }

  draft.demographics = { age: input.data.age, gender: input.data.gender }
  return finalizeDraft(draft)
}

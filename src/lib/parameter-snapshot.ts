// Parameter Snapshot
// Typed physiological state
// Closed vocabulary of categories and fields; every snapshot passes through these schemas,
// which strip out-of-vocabulary keys

import { z } from 'zod'
import { TwinValidationError } from './errors'

// ─── Field Schemas ──────────────────────────────────────────────────────────

const measurement = z.number().finite().nullable().optional()

export const SMOKING_STATUSES = ['never', 'former', 'current'] as const
export const ALCOHOL_LEVELS = ['none', 'moderate', 'heavy'] as const
export const GENDERS = ['M', 'F'] as const

export type SmokingStatus = (typeof SMOKING_STATUSES)[number]
export type AlcoholConsumption = (typeof ALCOHOL_LEVELS)[number]
export type Gender = (typeof GENDERS)[number]

export const vitalsSchema = z.object({
  heart_rate: measurement,
  blood_pressure_systolic: measurement,
  blood_pressure_diastolic: measurement,
  respiratory_rate: measurement,
  body_temperature: measurement,
  oxygen_saturation: measurement,
})

export const cbcSchema = z.object({
  hemoglobin: measurement,
  white_blood_cells: measurement,
  platelets: measurement,
  red_blood_cells: measurement,
})

export const metabolicSchema = z.object({
  glucose_fasting: measurement,
  glucose_random: measurement,
  hba1c: measurement,
  creatinine: measurement,
  bun: measurement,
  sodium: measurement,
  potassium: measurement,
  chloride: measurement,
  bicarbonate: measurement,
})

export const lipidsSchema = z.object({
  total_cholesterol: measurement,
  ldl: measurement,
  hdl: measurement,
  triglycerides: measurement,
})

export const liverSchema = z.object({
  alt: measurement,
  ast: measurement,
  bilirubin: measurement,
  albumin: measurement,
})

export const thyroidSchema = z.object({
  tsh: measurement,
  t3: measurement,
  t4: measurement,
})

export const lifestyleSchema = z.object({
  diet_carbs_percent: measurement,
  diet_fats_percent: measurement,
  diet_protein_percent: measurement,
  calorie_intake: measurement,
  exercise_frequency: measurement,
  exercise_duration: measurement,
  sleep_duration: measurement,
  sleep_quality: measurement,
  stress_level: measurement,
  smoking_status: z.enum(SMOKING_STATUSES).nullable().optional(),
  alcohol_consumption: z.enum(ALCOHOL_LEVELS).nullable().optional(),
})

export const physicalSchema = z.object({
  height_cm: measurement,
  weight_kg: measurement,
  bmi: measurement,
})

export const demographicsSchema = z.object({
  age: z.number().int().min(0).max(130),
  gender: z.enum(GENDERS),
})

export const parameterSnapshotSchema = z.object({
  vitals: vitalsSchema.optional(),
  cbc: cbcSchema.optional(),
  metabolic: metabolicSchema.optional(),
  lipids: lipidsSchema.optional(),
  liver: liverSchema.optional(),
  thyroid: thyroidSchema.optional(),
  lifestyle: lifestyleSchema.optional(),
  physical: physicalSchema.optional(),
  demographics: demographicsSchema.optional(),
})

// ─── Types ──────────────────────────────────────────────────────────────────

export type ParameterSnapshot = z.infer<typeof parameterSnapshotSchema>
export type Demographics = z.infer<typeof demographicsSchema>
export type LifestylePanel = z.infer<typeof lifestyleSchema>

const PANEL_SCHEMAS = {
  vitals: vitalsSchema,
  cbc: cbcSchema,
  metabolic: metabolicSchema,
  lipids: lipidsSchema,
  liver: liverSchema,
  thyroid: thyroidSchema,
  lifestyle: lifestyleSchema,
  physical: physicalSchema,
}

export type ParameterCategory = keyof typeof PANEL_SCHEMAS
export type FieldOf<C extends ParameterCategory> = keyof z.infer<(typeof PANEL_SCHEMAS)[C]> & string

/** The seven clinical categories plus physical measurements, in report order */
export const PARAMETER_CATEGORIES: readonly ParameterCategory[] = [
  'vitals',
  'cbc',
  'metabolic',
  'lipids',
  'liver',
  'thyroid',
  'lifestyle',
  'physical',
]

export const CATEGORY_FIELDS: { readonly [C in ParameterCategory]: readonly FieldOf<C>[] } = {
  vitals: vitalsSchema.keyof().options,
  cbc: cbcSchema.keyof().options,
  metabolic: metabolicSchema.keyof().options,
  lipids: lipidsSchema.keyof().options,
  liver: liverSchema.keyof().options,
  thyroid: thyroidSchema.keyof().options,
  lifestyle: lifestyleSchema.keyof().options,
  physical: physicalSchema.keyof().options,
}

export type FieldRef = { [C in ParameterCategory]: { category: C; field: FieldOf<C> } }[ParameterCategory]

export type FieldValue = number | string | null

/** Read-only view of any panel, keyed by field name */
export type PanelValues = { readonly [field: string]: FieldValue | undefined }

/** Mutable working copy used while a transformation builds its result */
export type SnapshotDraft = Partial<Record<ParameterCategory, Record<string, FieldValue>>> & {
  demographics?: Demographics
}

// ─── Field Lookup ───────────────────────────────────────────────────────────

export const ALL_FIELD_REFS: readonly FieldRef[] = [
  ...CATEGORY_FIELDS.vitals.map(field => ({ category: 'vitals' as const, field })),
  ...CATEGORY_FIELDS.cbc.map(field => ({ category: 'cbc' as const, field })),
  ...CATEGORY_FIELDS.metabolic.map(field => ({ category: 'metabolic' as const, field })),
  ...CATEGORY_FIELDS.lipids.map(field => ({ category: 'lipids' as const, field })),
  ...CATEGORY_FIELDS.liver.map(field => ({ category: 'liver' as const, field })),
  ...CATEGORY_FIELDS.thyroid.map(field => ({ category: 'thyroid' as const, field })),
  ...CATEGORY_FIELDS.lifestyle.map(field => ({ category: 'lifestyle' as const, field })),
  ...CATEGORY_FIELDS.physical.map(field => ({ category: 'physical' as const, field })),
]

const FIELD_INDEX = new Map<string, FieldRef>(ALL_FIELD_REFS.map(ref => [ref.field, ref]))

/** Resolve a bare field name (e.g. a CSV column) to its category */
export function resolveField(name: string): FieldRef | undefined {
  return FIELD_INDEX.get(name)
}

export function isParameterCategory(name: string): name is ParameterCategory {
  return PARAMETER_CATEGORIES.some(category => category === name)
}

/** Lifestyle fields that hold an enumeration instead of a measurement */
export const CATEGORICAL_FIELDS: ReadonlySet<string> = new Set(['smoking_status', 'alcohol_consumption'])

export function isAllowedLabel(field: string, label: string): boolean {
  if (field === 'smoking_status') return SMOKING_STATUSES.some(status => status === label)
  if (field === 'alcohol_consumption') return ALCOHOL_LEVELS.some(level => level === label)
  return false
}

// ─── Access ─────────────────────────────────────────────────────────────────

export function getPanel(snapshot: ParameterSnapshot, category: ParameterCategory): PanelValues | undefined {
  return snapshot[category]
}

/** Numeric value of a field, or null when missing, null, or categorical */
export function readNumber(snapshot: ParameterSnapshot, category: ParameterCategory, field: string): number | null {
  const value = getPanel(snapshot, category)?.[field]
  return typeof value === 'number' ? value : null
}

export function readLabel(snapshot: ParameterSnapshot, category: ParameterCategory, field: string): string | null {
  const value = getPanel(snapshot, category)?.[field]
  return typeof value === 'string' ? value : null
}

// ─── Construction ───────────────────────────────────────────────────────────

/**
 * Validate arbitrary input into a snapshot. Unknown categories and fields are dropped;
 * wrong value types raise TwinValidationError.
 */
export function parseSnapshot(input: unknown, context = 'Invalid parameter snapshot'): ParameterSnapshot {
  const result = parameterSnapshotSchema.safeParse(input)
  if (!result.success) {
    throw TwinValidationError.fromZod(context, result.error)
  }
  return result.data
}

function copyPanel(panel: PanelValues): Record<string, FieldValue> {
  const out: Record<string, FieldValue> = {}
  for (const [field, value] of Object.entries(panel)) {
    if (value !== undefined) out[field] = value
  }
  return out
}

export function toDraft(snapshot: ParameterSnapshot): SnapshotDraft {
  const draft: SnapshotDraft = {}
  for (const category of PARAMETER_CATEGORIES) {
    const panel = getPanel(snapshot, category)
    if (panel) draft[category] = copyPanel(panel)
  }
  if (snapshot.demographics) draft.demographics = { ...snapshot.demographics }
  return draft
}

export function setDraftValue(draft: SnapshotDraft, category: ParameterCategory, field: string, value: FieldValue): void {
  const panel = draft[category] ?? {}
  panel[field] = value
  draft[category] = panel
}

export function readDraftNumber(draft: SnapshotDraft, category: ParameterCategory, field: string): number | null {
  const value = draft[category]?.[field]
  return typeof value === 'number' ? value : null
}

export function finalizeDraft(draft: SnapshotDraft): ParameterSnapshot {
  return parseSnapshot(draft)
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals
  return Math.round(value * factor) / factor
}

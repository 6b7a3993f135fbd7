import { z } from 'zod'
import { GENDERS, parameterSnapshotSchema } from './parameter-snapshot'

// Common field schemas
const detailSchema = z.union([z.string(), z.number(), z.boolean()])
const weeksSchema = z.number().int('Duration must be a whole number of weeks').min(0, 'Duration cannot be negative')

// Intervention schemas
export const exerciseInterventionSchema = z.object({
  type: z.string().optional(),
  intensity: z.string().default('moderate'),
  duration_minutes: z.number().positive().optional(),
  frequency_per_week: z.number().min(0).max(14).optional(),
}).catchall(detailSchema)

export const dietInterventionSchema = z.object({
  type: z.string().default('balanced'),
}).catchall(detailSchema)

export const medicationInterventionSchema = z.object({
  name: z.string().default(''),
  dose: z.string().default('standard'),
}).catchall(detailSchema)

export const sleepInterventionSchema = z.object({
  improvement: z.string().default('moderate'),
}).catchall(detailSchema)

export const interventionSchema = z.object({
  exercise: exerciseInterventionSchema.optional(),
  diet: dietInterventionSchema.optional(),
  medication: medicationInterventionSchema.optional(),
  sleep: sleepInterventionSchema.optional(),
  lifestyle: z.record(z.string(), detailSchema).optional(),
  supplements: z.record(z.string(), detailSchema).optional(),
})

export type Intervention = z.infer<typeof interventionSchema>
export type InterventionInput = z.input<typeof interventionSchema>

export const durationWeeksSchema = weeksSchema

// Scenario schemas
export const RISK_LEVELS = ['low', 'medium', 'high'] as const

export const customScenarioSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(120),
  description: z.string().max(1000).default(''),
  interventions: interventionSchema,
  durationWeeks: weeksSchema.positive('Duration must be at least one week'),
  expectedOutcomes: z.array(z.string()).default([]),
  riskLevel: z.enum(RISK_LEVELS).default('medium'),
})

export type CustomScenarioInput = z.input<typeof customScenarioSchema>

// Twin profile schemas
export const twinProfileSchema = z.object({
  age: z.number().int().min(0).max(130),
  gender: z.enum(GENDERS),
  conditions: z.array(z.string()).default([]),
  heightCm: z.number().positive().optional(),
  weightKg: z.number().positive().optional(),
  overrides: parameterSnapshotSchema.omit({ demographics: true }).default({}),
})

export type TwinProfile = z.infer<typeof twinProfileSchema>
export type TwinProfileInput = z.input<typeof twinProfileSchema>

// Consultation schemas
export const CONSULTATION_TYPES = ['general', 'lifestyle', 'nutrition', 'exercise', 'comprehensive'] as const
export type ConsultationType = (typeof CONSULTATION_TYPES)[number]

// Helper to validate and return typed errors
export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown):
  | { success: true; data: T }
  | { success: false; error: string } {
  const result = schema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  const errors = result.error.issues.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')
  return { success: false, error: errors }
}

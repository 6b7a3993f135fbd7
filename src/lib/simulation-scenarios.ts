// Intervention scenarios
// Predefined catalog plus validated custom scenarios

import { z } from 'zod'
import scenarioCatalog from './data/scenarios.json'
import { TwinValidationError } from './errors'
import { parseDuration } from './intervention-effects'
import {
  RISK_LEVELS,
  customScenarioSchema,
  interventionSchema,
  type CustomScenarioInput,
  type Intervention,
} from './validations'

export type RiskLevel = (typeof RISK_LEVELS)[number]

export interface Scenario {
  id: string
  name: string
  description: string
  interventions: Intervention
  durationWeeks: number
  expectedOutcomes: string[]
  riskLevel: RiskLevel
  isCustom: boolean
}

const catalogSchema = z.array(z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  interventions: interventionSchema,
  durationWeeks: z.number().int().positive(),
  expectedOutcomes: z.array(z.string()),
  riskLevel: z.enum(RISK_LEVELS),
}))

function loadCatalog(): Scenario[] {
  const parsed = catalogSchema.safeParse(scenarioCatalog)
  if (!parsed.success) {
    throw TwinValidationError.fromZod('Invalid scenario catalog', parsed.error)
  }
  return parsed.data.map(scenario => ({ ...scenario, isCustom: false }))
}

const PREDEFINED_SCENARIOS = loadCatalog()

export function listScenarios(): Scenario[] {
  return PREDEFINED_SCENARIOS.map(scenario => ({ ...scenario }))
}

export function getScenario(id: string): Scenario {
  const scenario = PREDEFINED_SCENARIOS.find(s => s.id === id)
  if (!scenario) {
    throw new TwinValidationError('Unknown scenario', [`id: no scenario with id "${id}"`])
  }
  return { ...scenario }
}

function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
}

export function createCustomScenario(input: CustomScenarioInput): Scenario {
  const parsed = customScenarioSchema.safeParse(input)
  if (!parsed.success) {
    throw TwinValidationError.fromZod('Invalid custom scenario', parsed.error)
  }
  const { name, description, interventions, durationWeeks, expectedOutcomes, riskLevel } = parsed.data
  return {
    id: `custom-${slugify(name) || 'scenario'}`,
    name,
    description,
    interventions,
    durationWeeks: parseDuration(durationWeeks),
    expectedOutcomes,
    riskLevel,
    isCustom: true,
  }
}

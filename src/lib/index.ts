// Public entry points of the digital twin health engine

export { generateBaseline, CONDITION_OVERRIDES, type BaselineOptions, type BodyMeasurements } from './baseline-generator'
export { computeBmi, computeEgfr, resolveBmi, resolveEgfr } from './derived-metrics'
export {
  initializeTwin,
  runScenario,
  runSimulation,
  runWeeklySimulation,
  type DigitalTwin,
  type SimulationInput,
  type SimulationOutcome,
  type WeeklyProgressEntry,
  type WeeklySimulationInput,
  type WeeklySimulationOutcome,
} from './digital-twin'
export { getEngineConfig, loadEngineConfig, resetEngineConfig, type EngineConfig, type LogLevel } from './engine-config'
export { TwinValidationError, isTwinValidationError } from './errors'
export { CATEGORY_WEIGHTS, SCORED_CATEGORIES, type HealthLabel, type ScoredCategory } from './health-constants'
export {
  scoreSnapshot,
  scoreSnapshot as score,
  type CategoryBreakdown,
  type Interpretation,
  type ScoreOptions,
} from './health-scoring'
export {
  applyUpdates,
  projectIntervention,
  timeFactor,
  type FieldUpdate,
  type TaggedValue,
} from './intervention-effects'
export {
  buildReport,
  runVirtualTest,
  type PanelTestResult,
  type PatientInfo,
  type ReportEntry,
  type ReportPanel,
  type ScoredReport,
  type VirtualTestType,
} from './lab-report'
export {
  classifyMedication,
  predictMedicationImpact,
  type DrugClass,
  type MedicationImpact,
  type ParameterImpact,
} from './medication-impact'
export {
  buildProgressionPrompt,
  buildSimulationPrompt,
  narrateSafely,
  type Narrator,
} from './narration'
export {
  computeFlag,
  formatReferenceRange,
  getReferenceRange,
  type ParameterFlag,
  type ReferenceRange,
} from './parameter-reference'
export {
  CATEGORY_FIELDS,
  PARAMETER_CATEGORIES,
  parseSnapshot,
  resolveField,
  type FieldValue,
  type ParameterCategory,
  type ParameterSnapshot,
} from './parameter-snapshot'
export { createSeededRandom, systemRandom, type RandomSource } from './random-source'
export {
  nextSteps,
  recommendForIntervention,
  summarizeConsultation,
  type ConsultationSummary,
} from './simulation-recommendations'
export { createCustomScenario, getScenario, listScenarios, type Scenario } from './simulation-scenarios'
export {
  compareSnapshots,
  compareSnapshots as compare,
} from './snapshot-comparison'
export {
  CONSULTATION_TYPES,
  validate,
  type ConsultationType,
  type CustomScenarioInput,
  type Intervention,
  type InterventionInput,
  type TwinProfileInput,
} from './validations'
export { coerceCell, parseWeeklyCsv, parseWeeklyRows, toWeeklyRow, type CellValue } from './weekly-csv'
export {
  applyWeeklyRow,
  progressWeekly,
  type ChangesFromBaseline,
  type FieldChange,
  type WeekState,
  type WeeklyRow,
} from './weekly-progression'

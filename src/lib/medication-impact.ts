// Medication Impact
// Heuristic per-drug-class parameter predictions
// Matches the drug name against class name fragments and predicts an after-value
// for each affected parameter present in the baseline

import { safeDivide } from './health-constants'
import { getReferenceRange } from './parameter-reference'
import { readNumber, roundTo, type ParameterCategory, type ParameterSnapshot } from './parameter-snapshot'

// ─── Types ──────────────────────────────────────────────────────────────────

export type DrugClass =
  | 'statin'
  | 'ace_inhibitor'
  | 'metformin'
  | 'beta_blocker'
  | 'thyroid_hormone'
  | 'diuretic'

export type ImpactDirection = 'positive' | 'negative' | 'normalize'

interface ImpactRule {
  category: ParameterCategory
  field: string
  predict: (before: number) => number
  direction: ImpactDirection
  confidence: number
}

interface DrugClassProfile {
  drugClass: DrugClass
  patterns: readonly string[]
  impacts: readonly ImpactRule[]
}

export interface ParameterImpact {
  category: ParameterCategory
  field: string
  before: number
  after: number
  unit: string
  direction: ImpactDirection
  /** Signed, one decimal, e.g. "-30.0%" */
  percentChange: string
  confidence: number
}

export interface MedicationImpact {
  medication: string
  drugClass: DrugClass | null
  changes: ParameterImpact[]
  note: string | null
}

// ─── Profiles ───────────────────────────────────────────────────────────────

// Checked in order; the first profile with a matching fragment wins
const DRUG_PROFILES: readonly DrugClassProfile[] = [
  {
    drugClass: 'statin',
    patterns: ['atorvastatin', 'simvastatin', 'rosuvastatin', 'pravastatin', 'lovastatin', 'statin'],
    impacts: [
      { category: 'lipids', field: 'total_cholesterol', predict: b => Math.max(b * 0.7, b - 60), direction: 'negative', confidence: 85 },
      { category: 'lipids', field: 'ldl', predict: b => Math.max(b * 0.6, b - 50), direction: 'negative', confidence: 90 },
      { category: 'liver', field: 'alt', predict: b => Math.min(b * 1.2, b + 10), direction: 'positive', confidence: 70 },
    ],
  },
  {
    drugClass: 'ace_inhibitor',
    patterns: ['lisinopril', 'enalapril', 'captopril', 'ramipril', 'benazepril', 'pril'],
    impacts: [
      { category: 'vitals', field: 'blood_pressure_systolic', predict: b => Math.max(b - 15, 110), direction: 'negative', confidence: 85 },
      { category: 'vitals', field: 'blood_pressure_diastolic', predict: b => Math.max(b - 10, 70), direction: 'negative', confidence: 85 },
      { category: 'metabolic', field: 'potassium', predict: b => Math.min(b + 0.3, 5.0), direction: 'positive', confidence: 75 },
    ],
  },
  {
    drugClass: 'metformin',
    patterns: ['metformin', 'glucophage'],
    impacts: [
      { category: 'metabolic', field: 'glucose_fasting', predict: b => Math.max(b * 0.8, b - 30), direction: 'negative', confidence: 90 },
      { category: 'metabolic', field: 'hba1c', predict: b => Math.max(b - 0.8, 5.0), direction: 'negative', confidence: 85 },
    ],
  },
  {
    drugClass: 'beta_blocker',
    patterns: ['metoprolol', 'atenolol', 'propranolol', 'carvedilol', 'olol'],
    impacts: [
      { category: 'vitals', field: 'heart_rate', predict: b => Math.max(b - 15, 55), direction: 'negative', confidence: 90 },
      { category: 'vitals', field: 'blood_pressure_systolic', predict: b => Math.max(b - 12, 110), direction: 'negative', confidence: 80 },
    ],
  },
  {
    drugClass: 'thyroid_hormone',
    patterns: ['levothyroxine', 'synthroid', 'armour'],
    impacts: [
      { category: 'thyroid', field: 'tsh', predict: () => 2.5, direction: 'normalize', confidence: 85 },
    ],
  },
  {
    // Potassium-sparing
    drugClass: 'diuretic',
    patterns: ['spironolactone'],
    impacts: [
      { category: 'vitals', field: 'blood_pressure_systolic', predict: b => Math.max(b - 10, 110), direction: 'negative', confidence: 80 },
      { category: 'metabolic', field: 'potassium', predict: b => Math.min(b + 0.4, 5.0), direction: 'positive', confidence: 75 },
    ],
  },
  {
    drugClass: 'diuretic',
    patterns: ['hydrochlorothiazide', 'furosemide', 'thiazide'],
    impacts: [
      { category: 'vitals', field: 'blood_pressure_systolic', predict: b => Math.max(b - 10, 110), direction: 'negative', confidence: 80 },
      { category: 'metabolic', field: 'potassium', predict: b => Math.max(b - 0.3, 3.5), direction: 'negative', confidence: 75 },
    ],
  },
]

// ─── Prediction ─────────────────────────────────────────────────────────────

function findProfile(medication: string): DrugClassProfile | undefined {
  const lowered = medication.toLowerCase()
  return DRUG_PROFILES.find(profile => profile.patterns.some(p => lowered.includes(p)))
}

export function classifyMedication(medication: string): DrugClass | null {
  return findProfile(medication)?.drugClass ?? null
}

export function formatPercentChange(before: number, after: number): string {
  const ratio = safeDivide(after - before, before) ?? 0
  const percent = roundTo(ratio * 100, 1)
  return `${percent > 0 ? '+' : ''}${percent.toFixed(1)}%`
}

export function predictMedicationImpact(baseline: ParameterSnapshot, medication: string): MedicationImpact {
  const profile = findProfile(medication)
  const changes: ParameterImpact[] = []

  for (const impact of profile?.impacts ?? []) {
    const before = readNumber(baseline, impact.category, impact.field)
    if (before === null) continue
    const after = roundTo(impact.predict(before), 1)
    changes.push({
      category: impact.category,
      field: impact.field,
      before,
      after,
      unit: getReferenceRange(impact.category, impact.field)?.unit ?? '',
      direction: impact.direction,
      percentChange: formatPercentChange(before, after),
      confidence: impact.confidence,
    })
  }

  return {
    medication,
    drugClass: profile?.drugClass ?? null,
    changes,
    note: changes.length === 0
      ? `Specific predictions for ${medication} require more detailed pharmacological analysis.`
      : null,
  }
}

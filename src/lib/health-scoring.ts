// Health Scoring Engine
//
// Each scored category starts at 100 and walks its field ladders. A ladder is an
// ordered list of steps; the first step whose predicate matches contributes its
// points and findings. Fields missing from the snapshot are skipped, never defaulted.
// Flat zones (steps with no points and no finding) are intentional.

import { addDays, format } from 'date-fns'
import {
  CATEGORY_WEIGHTS,
  IMPROVEMENT_THRESHOLD,
  SCORED_CATEGORIES,
  bandForScore,
  clampScore,
  type HealthLabel,
  type ScoredCategory,
} from './health-constants'
import { readLabel, readNumber, type ParameterSnapshot } from './parameter-snapshot'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface Finding {
  risk?: string
  alert?: string
  recommendation?: string
  strength?: string
}

type StepOutcome = Finding & { points?: number }

interface LadderStep<V> extends Finding {
  when: (value: V) => boolean
  points?: number
}

type Ladder =
  | { kind: 'numeric'; read: (snapshot: ParameterSnapshot) => number | null; steps: readonly LadderStep<number>[] }
  | { kind: 'label'; read: (snapshot: ParameterSnapshot) => string | null; steps: readonly LadderStep<string>[] }

export interface FindingLists {
  riskFactors: string[]
  alerts: string[]
  recommendations: string[]
  strengths: string[]
}

export interface CategoryBreakdown extends FindingLists {
  score: number
}

export interface Interpretation extends FindingLists {
  overallScore: number
  label: HealthLabel
  description: string
  breakdown: Partial<Record<ScoredCategory, CategoryBreakdown>>
  improvementOpportunities: string[]
  nextReviewDate: string
}

export interface ScoreOptions {
  now?: Date
}

// ─── Ladders ────────────────────────────────────────────────────────────────

const SEEK_CARE = 'Seek immediate medical attention'
const CONSULT = 'Consult healthcare provider'
const URGENT = 'Immediate medical consultation required'

function numeric(
  category: ScoredCategory | 'physical',
  field: string,
  steps: readonly LadderStep<number>[],
): Ladder {
  return { kind: 'numeric', read: snapshot => readNumber(snapshot, category, field), steps }
}

function label(field: string, steps: readonly LadderStep<string>[]): Ladder {
  return { kind: 'label', read: snapshot => readLabel(snapshot, 'lifestyle', field), steps }
}

const CATEGORY_LADDERS: Readonly<Record<ScoredCategory, readonly Ladder[]>> = {
  vitals: [
    numeric('vitals', 'blood_pressure_systolic', [
      { when: v => v <= 120, strength: 'Optimal systolic blood pressure' },
      { when: v => v <= 129 },
      { when: v => v <= 139, points: -10, risk: 'Elevated systolic blood pressure', recommendation: 'Monitor blood pressure regularly' },
      { when: v => v <= 159, points: -20, risk: 'High systolic blood pressure (Stage 1)', alert: 'Consider lifestyle modifications' },
      { when: v => v <= 179, points: -35, risk: 'High systolic blood pressure (Stage 2)', alert: CONSULT },
      { when: () => true, points: -50, risk: 'Hypertensive crisis', alert: SEEK_CARE },
    ]),
    numeric('vitals', 'blood_pressure_diastolic', [
      { when: v => v <= 80, strength: 'Optimal diastolic blood pressure' },
      { when: v => v <= 89 },
      { when: v => v <= 99, points: -15, risk: 'High diastolic blood pressure (Stage 1)', recommendation: 'Reduce sodium intake and increase exercise' },
      { when: v => v <= 109, points: -25, risk: 'High diastolic blood pressure (Stage 2)', alert: CONSULT },
      { when: () => true, points: -40, risk: 'Diastolic hypertensive crisis', alert: SEEK_CARE },
    ]),
    numeric('vitals', 'heart_rate', [
      { when: v => v >= 60 && v <= 100, strength: 'Normal heart rate' },
      { when: v => v < 60, points: -15, risk: 'Bradycardia (slow heart rate)', recommendation: 'Monitor heart rate and consult if persistent' },
      { when: () => true, points: -15, risk: 'Tachycardia (fast heart rate)', recommendation: 'Monitor heart rate and consult if persistent' },
    ]),
    numeric('physical', 'bmi', [
      { when: v => v >= 18.5 && v <= 24.9, strength: 'Healthy BMI' },
      { when: v => v < 18.5, points: -10, risk: 'Underweight', recommendation: 'Consult nutritionist for healthy weight gain' },
      { when: v => v <= 29.9, points: -15, risk: 'Overweight', recommendation: 'Focus on balanced diet and regular exercise' },
      { when: v => v <= 34.9, points: -25, risk: 'Obesity (Class 1)', alert: 'Consider weight management program' },
      { when: v => v <= 39.9, points: -35, risk: 'Obesity (Class 2)', alert: 'Consult healthcare provider for weight management' },
      { when: () => true, points: -45, risk: 'Severe obesity (Class 3)', alert: 'Seek specialized medical care' },
    ]),
  ],
  metabolic: [
    numeric('metabolic', 'glucose_fasting', [
      { when: v => v <= 99, strength: 'Normal fasting glucose' },
      { when: v => v <= 125, points: -25, risk: 'Prediabetes (elevated fasting glucose)', recommendation: 'Implement lifestyle modifications', alert: 'Monitor glucose levels regularly' },
      { when: () => true, points: -45, risk: 'Diabetes (elevated fasting glucose)', alert: 'Consult healthcare provider immediately' },
    ]),
    numeric('metabolic', 'hba1c', [
      { when: v => v <= 5.6, strength: 'Normal HbA1c' },
      { when: v => v <= 6.4, points: -30, risk: 'Prediabetes (elevated HbA1c)', recommendation: 'Focus on diet and exercise', alert: 'Regular diabetes screening' },
      { when: () => true, points: -50, risk: 'Diabetes (elevated HbA1c)', alert: URGENT },
    ]),
    numeric('metabolic', 'creatinine', [
      { when: v => v <= 1.2, strength: 'Normal kidney function' },
      { when: () => true, points: -20, risk: 'Elevated creatinine', recommendation: 'Monitor kidney function', alert: 'Consult nephrologist if persistent' },
    ]),
  ],
  lipids: [
    numeric('lipids', 'ldl', [
      { when: v => v <= 99, strength: 'Optimal LDL cholesterol' },
      { when: v => v <= 129 },
      { when: v => v <= 159, points: -20, risk: 'Borderline high LDL cholesterol', recommendation: 'Implement heart-healthy diet' },
      { when: v => v <= 189, points: -30, risk: 'High LDL cholesterol', recommendation: 'Consider medication consultation', alert: 'Monitor cardiovascular risk' },
      { when: () => true, points: -45, risk: 'Very high LDL cholesterol', alert: URGENT },
    ]),
    numeric('lipids', 'hdl', [
      { when: v => v >= 60, points: 10, strength: 'High HDL cholesterol (protective)' },
      { when: v => v >= 40, strength: 'Normal HDL cholesterol' },
      { when: () => true, points: -20, risk: 'Low HDL cholesterol', recommendation: 'Increase physical activity and healthy fats' },
    ]),
    numeric('lipids', 'triglycerides', [
      { when: v => v <= 149, strength: 'Normal triglyceride levels' },
      { when: v => v <= 199, points: -15, risk: 'Borderline high triglycerides', recommendation: 'Reduce refined carbohydrates and alcohol' },
      { when: v => v <= 499, points: -25, risk: 'High triglycerides', recommendation: 'Implement comprehensive lifestyle changes', alert: 'Monitor for metabolic syndrome' },
      { when: () => true, points: -40, risk: 'Very high triglycerides', alert: URGENT },
    ]),
  ],
  lifestyle: [
    numeric('lifestyle', 'exercise_frequency', [
      { when: v => v >= 5, points: 10, strength: 'Excellent exercise routine' },
      { when: v => v >= 3, strength: 'Good exercise routine' },
      { when: v => v >= 1, points: -15, risk: 'Insufficient physical activity', recommendation: 'Increase exercise to 3+ times per week' },
      { when: () => true, points: -25, risk: 'Sedentary lifestyle', recommendation: 'Start with walking 30 minutes daily', alert: 'High risk for chronic diseases' },
    ]),
    numeric('lifestyle', 'sleep_duration', [
      { when: v => v >= 7 && v <= 9, strength: 'Optimal sleep duration' },
      { when: v => v >= 6 && v < 7, points: -10, risk: 'Slightly insufficient sleep', recommendation: 'Aim for 7-9 hours of sleep' },
      { when: () => true, points: -25, risk: 'Insufficient sleep', recommendation: 'Prioritize sleep hygiene and schedule', alert: 'Sleep deprivation affects all health markers' },
    ]),
    numeric('lifestyle', 'stress_level', [
      { when: v => v <= 3, strength: 'Low stress levels' },
      { when: v => v <= 6, points: -10, risk: 'Moderate stress levels', recommendation: 'Implement stress management techniques' },
      { when: () => true, points: -20, risk: 'High stress levels', recommendation: 'Consider counseling or stress management programs', alert: 'Chronic stress impacts overall health' },
    ]),
    label('smoking_status', [
      { when: v => v === 'current', points: -30, risk: 'Current smoker', recommendation: 'Consider smoking cessation program', alert: 'Smoking significantly increases health risks' },
      { when: v => v === 'former', points: -5, risk: 'Former smoker', recommendation: 'Maintain smoke-free lifestyle' },
    ]),
    label('alcohol_consumption', [
      { when: v => v === 'heavy', points: -25, risk: 'Heavy alcohol consumption', recommendation: 'Reduce alcohol intake', alert: 'Consult healthcare provider about alcohol use' },
      { when: v => v === 'moderate', points: -5, risk: 'Moderate alcohol consumption', recommendation: 'Monitor alcohol intake' },
    ]),
  ],
  cbc: [
    numeric('cbc', 'hemoglobin', [
      { when: v => v < 12, points: -15, risk: 'Low hemoglobin (possible anemia)', recommendation: 'Consult healthcare provider for evaluation' },
    ]),
  ],
  liver: [
    numeric('liver', 'alt', [
      { when: v => v > 55, points: -15, risk: 'Elevated ALT', recommendation: 'Monitor liver function' },
    ]),
  ],
  thyroid: [
    numeric('thyroid', 'tsh', [
      { when: v => v > 4.0, points: -15, risk: 'Elevated TSH', recommendation: 'Monitor thyroid function' },
    ]),
  ],
}

// ─── Category Scoring ───────────────────────────────────────────────────────

function emptyFindings(): FindingLists {
  return { riskFactors: [], alerts: [], recommendations: [], strengths: [] }
}

function record(lists: FindingLists, finding: Finding): void {
  if (finding.risk) lists.riskFactors.push(finding.risk)
  if (finding.alert) lists.alerts.push(finding.alert)
  if (finding.recommendation) lists.recommendations.push(finding.recommendation)
  if (finding.strength) lists.strengths.push(finding.strength)
}

function matchStep(ladder: Ladder, snapshot: ParameterSnapshot): StepOutcome | undefined {
  if (ladder.kind === 'numeric') {
    const value = ladder.read(snapshot)
    return value === null ? undefined : ladder.steps.find(step => step.when(value))
  }
  const value = ladder.read(snapshot)
  return value === null ? undefined : ladder.steps.find(step => step.when(value))
}

export function scoreCategory(category: ScoredCategory, snapshot: ParameterSnapshot): CategoryBreakdown {
  const lists = emptyFindings()
  let score = 100
  for (const ladder of CATEGORY_LADDERS[category]) {
    const step = matchStep(ladder, snapshot)
    if (!step) continue
    score += step.points ?? 0
    record(lists, step)
  }
  return { score: clampScore(score), ...lists }
}

// ─── Overall ────────────────────────────────────────────────────────────────

function dedupe(items: readonly string[]): string[] {
  return [...new Set(items)]
}

export function improvementOpportunities(
  breakdown: Partial<Record<ScoredCategory, CategoryBreakdown>>,
  overallScore: number,
): string[] {
  const lines: string[] = []
  for (const category of SCORED_CATEGORIES) {
    const score = breakdown[category]?.score
    if (score !== undefined && score < IMPROVEMENT_THRESHOLD) {
      lines.push(`Focus on ${category} improvements (current: ${score}/100)`)
    }
  }
  if (overallScore < 60) lines.push('Consider comprehensive health evaluation')
  else if (overallScore < 80) lines.push('Focus on high-impact lifestyle changes')
  else lines.push('Maintain current healthy habits')
  return lines
}

export function nextReviewDate(overallScore: number, now: Date = new Date()): string {
  return format(addDays(now, bandForScore(overallScore).reviewInDays), 'yyyy-MM-dd')
}

/**
 * Score every category present in the snapshot and combine them with weights
 * renormalized over the present categories.
 */
export function scoreSnapshot(snapshot: ParameterSnapshot, options: ScoreOptions = {}): Interpretation {
  const present = SCORED_CATEGORIES.filter(category => snapshot[category] !== undefined)
  const breakdown: Partial<Record<ScoredCategory, CategoryBreakdown>> = {}
  const merged = emptyFindings()
  let weightedSum = 0
  let totalWeight = 0

  for (const category of present) {
    const result = scoreCategory(category, snapshot)
    breakdown[category] = result
    merged.riskFactors.push(...result.riskFactors)
    merged.alerts.push(...result.alerts)
    merged.recommendations.push(...result.recommendations)
    merged.strengths.push(...result.strengths)
    weightedSum += result.score * CATEGORY_WEIGHTS[category]
    totalWeight += CATEGORY_WEIGHTS[category]
  }

  // No scored category present: overall stays 0
  const overallScore = totalWeight > 0 ? clampScore(Math.round(weightedSum / totalWeight)) : 0
  const band = bandForScore(overallScore)

  return {
    overallScore,
    label: band.label,
    description: band.description,
    riskFactors: dedupe(merged.riskFactors),
    alerts: dedupe(merged.alerts),
    recommendations: dedupe(merged.recommendations),
    strengths: dedupe(merged.strengths),
    breakdown,
    improvementOpportunities: improvementOpportunities(breakdown, overallScore),
    nextReviewDate: nextReviewDate(overallScore, options.now),
  }
}

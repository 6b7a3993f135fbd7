// Simulation recommendations, consultation summary and next steps

import { readNumber, type ParameterSnapshot } from './parameter-snapshot'
import type { ConsultationType, InterventionInput } from './validations'

// ─── Intervention Recommendations ───────────────────────────────────────────

const KIND_RECOMMENDATIONS = {
  exercise: [
    'Continue with the prescribed exercise program for optimal results',
    'Monitor heart rate and blood pressure during exercise',
    'Gradually increase intensity as fitness improves',
  ],
  diet: [
    'Maintain the dietary changes consistently',
    'Monitor portion sizes and meal timing',
    'Stay hydrated throughout the day',
  ],
  medication: [
    'Take medications as prescribed',
    'Monitor for any side effects',
    'Regular follow-up with healthcare provider',
  ],
  sleep: [
    'Keep the same bedtime and wake time every day',
    'Limit caffeine and screens in the evening',
    'Track nightly sleep duration',
  ],
  lifestyle: [
    'Maintain consistent sleep schedule',
    'Practice stress management techniques regularly',
    'Stay socially connected and engaged',
  ],
} as const

const GENERAL_RECOMMENDATIONS = [
  'Schedule regular health check-ups',
  'Track progress and maintain a health journal',
  'Celebrate improvements and stay motivated',
]

const KIND_ORDER = ['exercise', 'diet', 'medication', 'sleep', 'lifestyle'] as const

export function recommendForIntervention(intervention: InterventionInput): string[] {
  const lines: string[] = []
  for (const kind of KIND_ORDER) {
    if (intervention[kind] !== undefined) lines.push(...KIND_RECOMMENDATIONS[kind])
  }
  lines.push(...GENERAL_RECOMMENDATIONS)
  return lines
}

// ─── Consultation ───────────────────────────────────────────────────────────

export interface ConsultationSummary {
  consultationFocus: ConsultationType
  keyMetrics: Record<string, number>
  riskFactors: string[]
  strengths: string[]
  immediateActions: string[]
}

/** Quick screen of the headline metrics; absent fields are not assessed */
export function summarizeConsultation(snapshot: ParameterSnapshot, consultationType: ConsultationType): ConsultationSummary {
  const summary: ConsultationSummary = {
    consultationFocus: consultationType,
    keyMetrics: {},
    riskFactors: [],
    strengths: [],
    immediateActions: [],
  }
  const flag = (risk: string, action: string) => {
    summary.riskFactors.push(risk)
    summary.immediateActions.push(action)
  }

  const systolic = readNumber(snapshot, 'vitals', 'blood_pressure_systolic')
  if (systolic !== null) {
    summary.keyMetrics.blood_pressure_systolic = systolic
    if (systolic > 140) flag('Elevated systolic blood pressure', 'Monitor blood pressure daily')
    else if (systolic < 120) summary.strengths.push('Normal blood pressure')
  }

  const glucose = readNumber(snapshot, 'metabolic', 'glucose_fasting')
  if (glucose !== null) {
    summary.keyMetrics.glucose_fasting = glucose
    if (glucose > 100) flag('Elevated fasting glucose', 'Focus on carbohydrate management')
    else if (glucose < 90) summary.strengths.push('Healthy glucose levels')
  }

  const ldl = readNumber(snapshot, 'lipids', 'ldl')
  const hdl = readNumber(snapshot, 'lipids', 'hdl')
  if (ldl !== null) summary.keyMetrics.ldl = ldl
  if (hdl !== null) summary.keyMetrics.hdl = hdl
  if (ldl !== null && ldl > 100) flag('Elevated LDL cholesterol', 'Implement heart-healthy diet')
  else if (hdl !== null && hdl > 50) summary.strengths.push('Good HDL cholesterol')

  const exercise = readNumber(snapshot, 'lifestyle', 'exercise_frequency')
  if (exercise !== null) {
    summary.keyMetrics.exercise_frequency = exercise
    if (exercise < 3) flag('Insufficient physical activity', 'Start with 3 days/week exercise')
    else if (exercise >= 5) summary.strengths.push('Regular exercise routine')
  }

  const sleep = readNumber(snapshot, 'lifestyle', 'sleep_duration')
  if (sleep !== null) {
    summary.keyMetrics.sleep_duration = sleep
    if (sleep < 7) flag('Insufficient sleep', 'Aim for 7-9 hours sleep')
  }

  return summary
}

const NEXT_STEPS: Readonly<Record<ConsultationType, readonly string[]>> = {
  general: [
    'Review consultation recommendations',
    'Implement priority lifestyle changes',
    'Schedule follow-up consultation in 2-4 weeks',
  ],
  lifestyle: [
    'Start with one lifestyle change this week',
    'Track progress in a health journal',
    'Gradually add more changes over time',
  ],
  nutrition: [
    'Plan meals for the upcoming week',
    'Create a shopping list',
    'Start with one dietary change',
  ],
  exercise: [
    'Begin with light exercise routine',
    'Focus on consistency over intensity',
    'Monitor how your body responds',
  ],
  comprehensive: [
    'Review all recommendations thoroughly',
    'Create a personalized action plan',
    'Set specific, measurable goals',
    'Schedule regular progress reviews',
  ],
}

export function nextSteps(consultationType: ConsultationType, healthScore: number): string[] {
  const steps = [...NEXT_STEPS[consultationType]]
  if (healthScore < 50) steps.push('Consider consulting healthcare provider soon')
  else if (healthScore < 70) steps.push('Focus on high-impact lifestyle changes')
  else steps.push('Maintain current healthy habits')
  return steps
}

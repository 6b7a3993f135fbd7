// Health scoring constants and safe arithmetic
// Category weights, score bands and review intervals shared by scoring and reports

import type { ParameterCategory } from './parameter-snapshot'

// ─── Scoring ────────────────────────────────────────────────────────────────

export type ScoredCategory = Exclude<ParameterCategory, 'physical'>

/** Weights of the overall score; renormalized over the categories present */
export const CATEGORY_WEIGHTS: Readonly<Record<ScoredCategory, number>> = {
  vitals: 0.25,
  metabolic: 0.25,
  lipids: 0.2,
  lifestyle: 0.2,
  cbc: 0.05,
  liver: 0.03,
  thyroid: 0.02,
}

export const SCORED_CATEGORIES: readonly ScoredCategory[] = [
  'vitals',
  'metabolic',
  'lipids',
  'lifestyle',
  'cbc',
  'liver',
  'thyroid',
]

export type HealthLabel = 'Excellent' | 'Good' | 'Fair' | 'Poor' | 'Critical'

export interface ScoreBand {
  minScore: number
  label: HealthLabel
  description: string
  reviewInDays: number
}

// Ordered high to low; first band whose minScore is reached wins
export const SCORE_BANDS: readonly ScoreBand[] = [
  { minScore: 90, label: 'Excellent', description: 'Optimal health status', reviewInDays: 180 },
  { minScore: 75, label: 'Good', description: 'Good health with minor areas for improvement', reviewInDays: 90 },
  { minScore: 60, label: 'Fair', description: 'Moderate health concerns requiring attention', reviewInDays: 30 },
  { minScore: 40, label: 'Poor', description: 'Significant health issues needing intervention', reviewInDays: 7 },
  { minScore: 0, label: 'Critical', description: 'Critical health status requiring immediate care', reviewInDays: 7 },
]

/** Category sub-scores below this get an improvement line */
export const IMPROVEMENT_THRESHOLD = 80

export function bandForScore(score: number): ScoreBand {
  return SCORE_BANDS.find(band => score >= band.minScore) ?? SCORE_BANDS[SCORE_BANDS.length - 1]
}

// ─── Safe Math ──────────────────────────────────────────────────────────────

export function clampScore(score: number): number {
  if (!isFinite(score)) return 0
  return Math.min(100, Math.max(0, score))
}

export function safeDivide(numerator: number, denominator: number): number | null {
  if (!isFinite(numerator) || !isFinite(denominator) || denominator === 0) return null
  const result = numerator / denominator
  return isFinite(result) ? result : null
}

/** Percent change from baseline, one decimal; 0 when the baseline is 0 */
export function relativeChangePercent(current: number, baseline: number): number {
  const ratio = safeDivide(current - baseline, baseline)
  if (ratio === null) return 0
  return Math.round(ratio * 1000) / 10
}

// Report Builder
// Reference-annotated snapshot plus interpretation

import { resolveBmi, resolveEgfr } from './derived-metrics'
import { TwinValidationError } from './errors'
import { scoreSnapshot, type Interpretation } from './health-scoring'
import {
  computeFlag,
  formatReferenceRange,
  getRangedFields,
  getReferenceRange,
  type ParameterFlag,
} from './parameter-reference'
import {
  PARAMETER_CATEGORIES,
  getPanel,
  isParameterCategory,
  type FieldValue,
  type Gender,
  type LifestylePanel,
  type ParameterCategory,
  type ParameterSnapshot,
} from './parameter-snapshot'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface ReportEntry {
  value: FieldValue
  unit: string
  referenceRange: string
  flag: ParameterFlag
}

export type ReportPanel = Record<string, ReportEntry>

export interface PatientInfo {
  age: number | null
  gender: Gender | null
  bmi: number | null
  egfr: number | null
}

export interface ScoredReport {
  reportDate: string
  patientInfo: PatientInfo
  results: Record<ParameterCategory, ReportPanel>
  /** Raw lifestyle panel, enumerations included */
  lifestyleAssessment: LifestylePanel
  interpretation: Interpretation
}

export interface PanelTestResult {
  testType: ParameterCategory
  testDate: string
  results: ReportPanel
}

export interface ReportOptions {
  now?: Date
}

// ─── Annotation ─────────────────────────────────────────────────────────────

/** Every ranged field of the category; missing fields report null / N/A */
export function annotatePanel(snapshot: ParameterSnapshot, category: ParameterCategory): ReportPanel {
  const panel = getPanel(snapshot, category)
  const annotated: ReportPanel = {}
  for (const field of getRangedFields(category)) {
    const range = getReferenceRange(category, field)
    if (!range) continue
    const value = panel?.[field] ?? null
    annotated[field] = {
      value,
      unit: range.unit,
      referenceRange: formatReferenceRange(range),
      flag: computeFlag(value, range),
    }
  }
  return annotated
}

function annotateAll(snapshot: ParameterSnapshot): Record<ParameterCategory, ReportPanel> {
  return {
    vitals: annotatePanel(snapshot, 'vitals'),
    cbc: annotatePanel(snapshot, 'cbc'),
    metabolic: annotatePanel(snapshot, 'metabolic'),
    lipids: annotatePanel(snapshot, 'lipids'),
    liver: annotatePanel(snapshot, 'liver'),
    thyroid: annotatePanel(snapshot, 'thyroid'),
    lifestyle: annotatePanel(snapshot, 'lifestyle'),
    physical: annotatePanel(snapshot, 'physical'),
  }
}

// ─── Reports ────────────────────────────────────────────────────────────────

export function buildReport(snapshot: ParameterSnapshot, options: ReportOptions = {}): ScoredReport {
  const now = options.now ?? new Date()
  return {
    reportDate: now.toISOString(),
    patientInfo: {
      age: snapshot.demographics?.age ?? null,
      gender: snapshot.demographics?.gender ?? null,
      bmi: resolveBmi(snapshot),
      egfr: resolveEgfr(snapshot),
    },
    results: annotateAll(snapshot),
    lifestyleAssessment: { ...snapshot.lifestyle },
    interpretation: scoreSnapshot(snapshot, { now }),
  }
}

export type VirtualTestType = 'comprehensive' | ParameterCategory

/**
 * `comprehensive` builds the full report; a category name annotates that panel alone.
 */
export function runVirtualTest(snapshot: ParameterSnapshot, testType: 'comprehensive', options?: ReportOptions): ScoredReport
export function runVirtualTest(snapshot: ParameterSnapshot, testType: ParameterCategory, options?: ReportOptions): PanelTestResult
export function runVirtualTest(snapshot: ParameterSnapshot, testType: string, options?: ReportOptions): ScoredReport | PanelTestResult
export function runVirtualTest(
  snapshot: ParameterSnapshot,
  testType: string,
  options: ReportOptions = {},
): ScoredReport | PanelTestResult {
  if (testType === 'comprehensive') return buildReport(snapshot, options)
  if (!isParameterCategory(testType)) {
    throw new TwinValidationError('Unknown test type', [
      `testType: expected comprehensive or one of ${PARAMETER_CATEGORIES.join(', ')}`,
    ])
  }
  const now = options.now ?? new Date()
  return {
    testType,
    testDate: now.toISOString(),
    results: annotatePanel(snapshot, testType),
  }
}

import { describe, it, expect } from 'vitest'
import {
  computeFlag,
  formatReferenceRange,
  getRangedFields,
  getReferenceRange,
  type ReferenceRange,
} from '../parameter-reference'
import { CATEGORICAL_FIELDS, PARAMETER_CATEGORIES, CATEGORY_FIELDS } from '../parameter-snapshot'

const HEMOGLOBIN: ReferenceRange = { min: 12, max: 16, unit: 'g/dL' }

// ─── Catalog ────────────────────────────────────────────────────────────

describe('reference catalog', () => {
  it('covers every numeric field of the vocabulary', () => {
    for (const category of PARAMETER_CATEGORIES) {
      const fields: readonly string[] = CATEGORY_FIELDS[category]
      for (const field of fields) {
        if (CATEGORICAL_FIELDS.has(field)) continue
        expect(getReferenceRange(category, field), `${category}.${field}`).toBeDefined()
      }
    }
  })

  it('has no range for enumerations', () => {
    expect(getReferenceRange('lifestyle', 'smoking_status')).toBeUndefined()
    expect(getRangedFields('lifestyle')).not.toContain('alcohol_consumption')
  })

  it('returns units with the range', () => {
    expect(getReferenceRange('vitals', 'heart_rate')).toEqual({ min: 60, max: 100, unit: 'BPM' })
    expect(getReferenceRange('thyroid', 'tsh')).toEqual({ min: 0.4, max: 4.0, unit: 'μIU/mL' })
  })

  it('lists ranged fields in vocabulary order', () => {
    expect(getRangedFields('lipids')).toEqual(['total_cholesterol', 'ldl', 'hdl', 'triglycerides'])
  })
})

// ─── formatReferenceRange ───────────────────────────────────────────────

describe('formatReferenceRange', () => {
  it('joins min and max', () => {
    expect(formatReferenceRange(HEMOGLOBIN)).toBe('12-16')
    expect(formatReferenceRange({ min: 36.5, max: 37.5, unit: '°C' })).toBe('36.5-37.5')
  })
})

// ─── computeFlag ────────────────────────────────────────────────────────

describe('computeFlag', () => {
  it('flags values below, above and within range', () => {
    expect(computeFlag(11, HEMOGLOBIN)).toBe('L')
    expect(computeFlag(17, HEMOGLOBIN)).toBe('H')
    expect(computeFlag(14, HEMOGLOBIN)).toBe('N')
  })

  it('treats range bounds as normal', () => {
    expect(computeFlag(12, HEMOGLOBIN)).toBe('N')
    expect(computeFlag(16, HEMOGLOBIN)).toBe('N')
  })

  it('reports N/A only for missing values', () => {
    expect(computeFlag(null, HEMOGLOBIN)).toBe('N/A')
    expect(computeFlag(undefined, HEMOGLOBIN)).toBe('N/A')
    expect(computeFlag(0, HEMOGLOBIN)).toBe('L')
  })

  it('does not range-check labels', () => {
    expect(computeFlag('current', HEMOGLOBIN)).toBe('N')
  })
})

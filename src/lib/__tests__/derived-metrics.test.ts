import { describe, it, expect } from 'vitest'
import { computeBmi, computeEgfr, resolveBmi, resolveEgfr } from '../derived-metrics'
import { parseSnapshot } from '../parameter-snapshot'

// ─── computeBmi ─────────────────────────────────────────────────────────

describe('computeBmi', () => {
  it('divides weight by squared height in meters', () => {
    expect(computeBmi(72, 170)).toBe(24.9)
    expect(computeBmi(65, 170)).toBe(22.5)
    expect(computeBmi(80, 170)).toBe(27.7)
  })

  it('returns null when an input is missing or height is not positive', () => {
    expect(computeBmi(null, 170)).toBeNull()
    expect(computeBmi(72, null)).toBeNull()
    expect(computeBmi(72, 0)).toBeNull()
  })
})

// ─── computeEgfr ────────────────────────────────────────────────────────

describe('computeEgfr', () => {
  it('applies the female factor', () => {
    expect(computeEgfr(1.0, 45, 'F')).toBe(60)
  })

  it('computes the male estimate', () => {
    expect(computeEgfr(1.2, 60, 'M')).toBe(61.8)
  })

  it('is lower for women at the same creatinine and age', () => {
    const female = computeEgfr(0.9, 50, 'F')
    const male = computeEgfr(0.9, 50, 'M')
    expect(female).not.toBeNull()
    expect(male).not.toBeNull()
    expect(female!).toBeLessThan(male!)
  })

  it('returns null without creatinine or demographics', () => {
    expect(computeEgfr(null, 45, 'F')).toBeNull()
    expect(computeEgfr(1.0, null, 'F')).toBeNull()
    expect(computeEgfr(1.0, 45, null)).toBeNull()
    expect(computeEgfr(0, 45, 'F')).toBeNull()
  })
})

// ─── Snapshot resolution ────────────────────────────────────────────────

describe('resolveBmi', () => {
  it('prefers the stored value', () => {
    const snapshot = parseSnapshot({ physical: { height_cm: 170, weight_kg: 72, bmi: 30 } })
    expect(resolveBmi(snapshot)).toBe(30)
  })

  it('computes from height and weight when not stored', () => {
    const snapshot = parseSnapshot({ physical: { height_cm: 170, weight_kg: 72 } })
    expect(resolveBmi(snapshot)).toBe(24.9)
  })

  it('is null without a physical panel', () => {
    expect(resolveBmi({})).toBeNull()
  })
})

describe('resolveEgfr', () => {
  it('uses creatinine and demographics from the snapshot', () => {
    const snapshot = parseSnapshot({
      metabolic: { creatinine: 1.0 },
      demographics: { age: 45, gender: 'F' },
    })
    expect(resolveEgfr(snapshot)).toBe(60)
  })

  it('is null without demographics', () => {
    expect(resolveEgfr(parseSnapshot({ metabolic: { creatinine: 1.0 } }))).toBeNull()
  })
})

import { describe, it, expect } from 'vitest'
import { TwinValidationError } from '../errors'
import {
  applyRule,
  applyUpdates,
  matchMedicationClass,
  projectIntervention,
  timeFactor,
  type EffectRule,
} from '../intervention-effects'
import { parseSnapshot } from '../parameter-snapshot'
import { HEALTHY, hypertensive, makeSnapshot } from './fixtures/twin-fixtures'

const MODERATE_EXERCISE = { exercise: { type: 'aerobic', intensity: 'moderate' } }

// ─── Primitives ─────────────────────────────────────────────────────────

describe('timeFactor', () => {
  it('scales linearly up to twelve weeks', () => {
    expect(timeFactor(0)).toBe(0)
    expect(timeFactor(6)).toBe(0.5)
    expect(timeFactor(12)).toBe(1)
  })

  it('saturates after twelve weeks', () => {
    expect(timeFactor(24)).toBe(1)
    expect(timeFactor(104)).toBe(1)
  })
})

describe('applyRule', () => {
  const systolic: EffectRule = { category: 'vitals', field: 'blood_pressure_systolic', coefficient: -8, cap: 20 }
  const hdl: EffectRule = { category: 'lipids', field: 'hdl', coefficient: 5, cap: 15 }

  it('floors whole-unit effects', () => {
    expect(applyRule(150, systolic, 0.5)).toBe(146)
    expect(applyRule(55, hdl, 0.5)).toBe(57)
  })

  it('keeps fractional steps for continuous rules', () => {
    const hba1c: EffectRule = { category: 'metabolic', field: 'hba1c', coefficient: -0.3, cap: 0.8, continuous: true }
    expect(applyRule(7, hba1c, 0.5)).toBe(6.85)
  })

  it('never moves past the cap', () => {
    const capped: EffectRule = { ...systolic, cap: 3 }
    expect(applyRule(150, capped, 1)).toBe(147)
  })
})

describe('matchMedicationClass', () => {
  it('matches name fragments case-insensitively', () => {
    expect(matchMedicationClass('Atorvastatin 20mg')).toBe('statin')
    expect(matchMedicationClass('ARB (losartan)')).toBe('ace_inhibitor')
    expect(matchMedicationClass('Metformin XR')).toBe('metformin')
  })

  it('returns null for unknown drugs', () => {
    expect(matchMedicationClass('aspirin')).toBeNull()
  })
})

// ─── projectIntervention ────────────────────────────────────────────────

describe('projectIntervention', () => {
  it('lowers 150/95 to 142/90 after twelve weeks of moderate exercise', () => {
    const projected = projectIntervention(hypertensive(), MODERATE_EXERCISE, 12)
    expect(projected.vitals?.blood_pressure_systolic).toBe(142)
    expect(projected.vitals?.blood_pressure_diastolic).toBe(90)
    expect(projected.vitals?.heart_rate).toBe(67)
    expect(projected.lipids?.hdl).toBe(60)
    expect(projected.lipids?.triglycerides).toBe(100)
    expect(projected.metabolic?.glucose_fasting).toBe(80)
  })

  it('scales with duration', () => {
    const projected = projectIntervention(hypertensive(), MODERATE_EXERCISE, 6)
    expect(projected.vitals?.blood_pressure_systolic).toBe(146)
    expect(projected.vitals?.blood_pressure_diastolic).toBe(93)
    expect(projected.vitals?.heart_rate).toBe(70)
    expect(projected.lipids?.triglycerides).toBe(110)
  })

  it('leaves the baseline unchanged at zero weeks', () => {
    const baseline = hypertensive()
    expect(projectIntervention(baseline, MODERATE_EXERCISE, 0)).toEqual(baseline)
  })

  it('gives the same result at twelve weeks and beyond', () => {
    const baseline = hypertensive()
    const at12 = projectIntervention(baseline, MODERATE_EXERCISE, 12)
    expect(projectIntervention(baseline, MODERATE_EXERCISE, 24)).toEqual(at12)
    expect(projectIntervention(baseline, MODERATE_EXERCISE, 104)).toEqual(at12)
  })

  it('accepts durations longer than two years', () => {
    const projected = projectIntervention(hypertensive(), MODERATE_EXERCISE, 156)
    expect(projected.vitals?.blood_pressure_systolic).toBe(142)
    expect(projected.vitals?.blood_pressure_diastolic).toBe(90)
  })

  it('does not mutate the baseline', () => {
    const baseline = hypertensive()
    const before = structuredClone(baseline)
    projectIntervention(baseline, MODERATE_EXERCISE, 12)
    expect(baseline).toEqual(before)
  })

  it('keeps untouched fields and demographics', () => {
    const projected = projectIntervention(HEALTHY, MODERATE_EXERCISE, 12)
    expect(projected.cbc).toEqual(HEALTHY.cbc)
    expect(projected.lifestyle).toEqual(HEALTHY.lifestyle)
    expect(projected.demographics).toEqual({ age: 45, gender: 'F' })
  })

  it('skips fields missing from the baseline', () => {
    const baseline = parseSnapshot({ vitals: { blood_pressure_systolic: 150 } })
    const projected = projectIntervention(baseline, MODERATE_EXERCISE, 12)
    expect(projected).toEqual({ vitals: { blood_pressure_systolic: 142 } })
  })

  it('has no effect for light exercise', () => {
    const baseline = hypertensive()
    expect(projectIntervention(baseline, { exercise: { intensity: 'light' } }, 12)).toEqual(baseline)
  })

  it('defaults exercise intensity to moderate', () => {
    const projected = projectIntervention(hypertensive(), { exercise: {} }, 12)
    expect(projected.vitals?.blood_pressure_systolic).toBe(142)
  })

  it('adds the effects of several kinds on the same field', () => {
    const projected = projectIntervention(hypertensive(), {
      ...MODERATE_EXERCISE,
      diet: { type: 'low_sodium' },
    }, 12)
    expect(projected.vitals?.blood_pressure_systolic).toBe(132)
    expect(projected.vitals?.blood_pressure_diastolic).toBe(84)
  })

  it('raises HDL and lowers LDL for exercise with a mediterranean diet', () => {
    const projected = projectIntervention(HEALTHY, { ...MODERATE_EXERCISE, diet: { type: 'mediterranean' } }, 12)
    expect(projected.lipids?.hdl).toBe(68)
    expect(projected.lipids?.ldl).toBe(80)
  })

  it('ignores unknown diet types', () => {
    expect(projectIntervention(HEALTHY, { diet: { type: 'keto' } }, 12)).toEqual(HEALTHY)
  })

  it('applies statin effects to LDL and total cholesterol', () => {
    const projected = projectIntervention(HEALTHY, { medication: { name: 'Atorvastatin 20mg' } }, 12)
    expect(projected.lipids?.ldl).toBe(65)
    expect(projected.lipids?.total_cholesterol).toBe(155)
  })

  it('applies blood pressure medication effects', () => {
    const projected = projectIntervention(hypertensive(), { medication: { name: 'ARB (losartan)' } }, 12)
    expect(projected.vitals?.blood_pressure_systolic).toBe(135)
    expect(projected.vitals?.blood_pressure_diastolic).toBe(87)
  })

  it('lowers HbA1c only above 5.7', () => {
    const healthy = projectIntervention(HEALTHY, { medication: { name: 'metformin' } }, 12)
    expect(healthy.metabolic?.hba1c).toBe(5.2)
    expect(healthy.metabolic?.glucose_fasting).toBe(68)

    const diabetic = makeSnapshot({ metabolic: { hba1c: 7 } })
    const projected = projectIntervention(diabetic, { ...MODERATE_EXERCISE, medication: { name: 'metformin' } }, 12)
    expect(projected.metabolic?.hba1c).toBe(5.9)
    expect(projected.metabolic?.glucose_fasting).toBe(60)
  })

  it('scales HbA1c without flooring', () => {
    const diabetic = makeSnapshot({ metabolic: { hba1c: 7 } })
    const projected = projectIntervention(diabetic, { medication: { name: 'metformin' } }, 6)
    expect(projected.metabolic?.hba1c).toBe(6.6)
  })

  it('lowers blood pressure and stress for improved sleep', () => {
    const projected = projectIntervention(hypertensive(), { sleep: { improvement: 'significant' } }, 12)
    expect(projected.vitals?.blood_pressure_systolic).toBe(145)
    expect(projected.lifestyle?.stress_level).toBe(1)
  })

  it('ignores slight sleep improvements', () => {
    const baseline = hypertensive()
    expect(projectIntervention(baseline, { sleep: { improvement: 'slight' } }, 12)).toEqual(baseline)
  })

  it('rejects negative and fractional durations', () => {
    expect(() => projectIntervention(HEALTHY, MODERATE_EXERCISE, -1)).toThrow(TwinValidationError)
    expect(() => projectIntervention(HEALTHY, MODERATE_EXERCISE, 2.5)).toThrow(TwinValidationError)
  })
})

// ─── applyUpdates ───────────────────────────────────────────────────────

describe('applyUpdates', () => {
  it('replaces absolute values and adds deltas', () => {
    const updated = applyUpdates(HEALTHY, [
      { category: 'vitals', field: 'heart_rate', change: { kind: 'absolute', value: 80 } },
      { category: 'lipids', field: 'ldl', change: { kind: 'delta', value: -5 } },
    ])
    expect(updated.vitals?.heart_rate).toBe(80)
    expect(updated.lipids?.ldl).toBe(90)
  })

  it('adds a delta to zero when the field is absent', () => {
    const updated = applyUpdates({}, [
      { category: 'lifestyle', field: 'stress_level', change: { kind: 'delta', value: 2 } },
    ])
    expect(updated).toEqual({ lifestyle: { stress_level: 2 } })
  })

  it('recomputes BMI when weight changes', () => {
    const updated = applyUpdates(HEALTHY, [
      { category: 'physical', field: 'weight_kg', change: { kind: 'delta', value: 7 } },
    ])
    expect(updated.physical).toEqual({ height_cm: 170, weight_kg: 72, bmi: 24.9 })
  })

  it('sets allowed labels on enumerations', () => {
    const updated = applyUpdates(HEALTHY, [
      { category: 'lifestyle', field: 'smoking_status', change: { kind: 'label', value: 'former' } },
    ])
    expect(updated.lifestyle?.smoking_status).toBe('former')
  })

  it('skips invalid labels and numeric values on enumerations', () => {
    const updated = applyUpdates(HEALTHY, [
      { category: 'lifestyle', field: 'smoking_status', change: { kind: 'label', value: 'sometimes' } },
      { category: 'lifestyle', field: 'alcohol_consumption', change: { kind: 'absolute', value: 2 } },
      { category: 'vitals', field: 'heart_rate', change: { kind: 'label', value: 'never' } },
    ])
    expect(updated).toEqual(HEALTHY)
  })
})

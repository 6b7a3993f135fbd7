import { describe, it, expect } from 'vitest'
import { initializeTwin, runScenario, runSimulation, runWeeklySimulation } from '../digital-twin'
import { TwinValidationError } from '../errors'
import { HEALTHY, NOW, constantRandom, hypertensive } from './fixtures/twin-fixtures'

const GENERAL = [
  'Schedule regular health check-ups',
  'Track progress and maintain a health journal',
  'Celebrate improvements and stay motivated',
]

// ─── initializeTwin ─────────────────────────────────────────────────────

describe('initializeTwin', () => {
  it('generates a baseline and applies overrides', () => {
    const twin = initializeTwin({
      age: 45,
      gender: 'F',
      heightCm: 170,
      weightKg: 72,
      overrides: { vitals: { blood_pressure_systolic: 150 } },
    }, { random: constantRandom(0) })

    expect(twin.profile.conditions).toEqual([])
    expect(twin.baseline.demographics).toEqual({ age: 45, gender: 'F' })
    expect(twin.baseline.vitals?.blood_pressure_systolic).toBe(150)
    expect(twin.baseline.vitals?.heart_rate).toBe(60)
    expect(twin.baseline.physical).toEqual({ height_cm: 170, weight_kg: 72, bmi: 24.9 })
  })

  it('recomputes BMI after a weight override', () => {
    const twin = initializeTwin({
      age: 45,
      gender: 'F',
      heightCm: 170,
      weightKg: 72,
      overrides: { physical: { weight_kg: 80 } },
    }, { random: constantRandom(0) })
    expect(twin.baseline.physical?.bmi).toBe(27.7)
  })

  it('keeps an explicit BMI override', () => {
    const twin = initializeTwin({
      age: 45,
      gender: 'F',
      heightCm: 170,
      weightKg: 72,
      overrides: { physical: { bmi: 30 } },
    }, { random: constantRandom(0) })
    expect(twin.baseline.physical?.bmi).toBe(30)
  })

  it('stores height alone without a BMI', () => {
    const twin = initializeTwin({ age: 30, gender: 'M', heightCm: 180 }, { random: constantRandom(0) })
    expect(twin.baseline.physical).toEqual({ height_cm: 180 })
  })

  it('passes conditions to the generator', () => {
    const twin = initializeTwin({ age: 60, gender: 'M', conditions: ['diabetes'] }, { random: constantRandom(0) })
    expect(twin.baseline.metabolic?.glucose_fasting).toBe(126)
  })

  it('rejects invalid profiles', () => {
    expect(() => initializeTwin({ age: 200, gender: 'F' })).toThrow(TwinValidationError)
  })
})

// ─── runSimulation ──────────────────────────────────────────────────────

describe('runSimulation', () => {
  const outcome = runSimulation({
    baseline: hypertensive(),
    intervention: { exercise: { intensity: 'moderate' } },
    durationWeeks: 12,
    now: NOW,
  })

  it('projects the baseline', () => {
    expect(outcome.durationWeeks).toBe(12)
    expect(outcome.projected.vitals?.blood_pressure_systolic).toBe(142)
    expect(outcome.projected.vitals?.blood_pressure_diastolic).toBe(90)
  })

  it('lists improvements and recommendations', () => {
    expect(outcome.improvements).toEqual([
      'Blood pressure reduced by 8 mmHg systolic',
      'Blood pressure reduced by 5 mmHg diastolic',
      'Fasting glucose reduced by 8 mg/dL',
      'HDL cholesterol increased by 5 mg/dL',
    ])
    expect(outcome.recommendations).toHaveLength(6)
  })

  it('reports both ends', () => {
    expect(outcome.baselineReport.interpretation.overallScore).toBe(91)
    expect(outcome.projectedReport.interpretation.overallScore).toBe(91)
    expect(outcome.projectedReport.interpretation.riskFactors).toEqual([
      'High systolic blood pressure (Stage 1)',
      'High diastolic blood pressure (Stage 1)',
    ])
    expect(outcome.projectedReport.reportDate).toBe(NOW.toISOString())
  })
})

// ─── runScenario ────────────────────────────────────────────────────────

describe('runScenario', () => {
  it('runs a predefined scenario by id', () => {
    const outcome = runScenario(HEALTHY, '1', { now: NOW })
    expect(outcome.durationWeeks).toBe(12)
    expect(outcome.projected.lipids?.ldl).toBe(80)
    expect(outcome.projected.lipids?.hdl).toBe(68)
    expect(outcome.improvements).toEqual([
      'Blood pressure reduced by 8 mmHg systolic',
      'Blood pressure reduced by 5 mmHg diastolic',
      'Fasting glucose reduced by 8 mg/dL',
      'LDL cholesterol reduced by 15 mg/dL',
      'HDL cholesterol increased by 13 mg/dL',
    ])
    expect(outcome.recommendations).toHaveLength(12)
  })

  it('leaves the baseline unchanged when no rule applies', () => {
    const outcome = runScenario(HEALTHY, '3', { now: NOW })
    expect(outcome.projected).toEqual(HEALTHY)
    expect(outcome.improvements).toEqual([])
  })

  it('rejects unknown scenario ids', () => {
    expect(() => runScenario(HEALTHY, 'missing')).toThrow(TwinValidationError)
  })
})

// ─── runWeeklySimulation ────────────────────────────────────────────────

describe('runWeeklySimulation', () => {
  const csv = 'week,weight_kg,blood_pressure_systolic\n1,-1,\n2,,112\n'

  it('replays weekly CSV data', () => {
    const outcome = runWeeklySimulation({ baseline: HEALTHY, rows: csv, durationWeeks: 3, now: NOW })

    expect(outcome.durationWeeks).toBe(3)
    expect(outcome.progression.map(p => p.week)).toEqual([1, 2, 3])
    expect(outcome.progression[0].snapshot.physical).toEqual({ height_cm: 170, weight_kg: 64, bmi: 22.1 })
    expect(outcome.progression[0].changes.physical?.weight_kg).toEqual({
      baseline: 65,
      current: 64,
      absoluteChange: -1,
      relativeChange: -1.5,
    })
    expect(outcome.progression[1].snapshot.vitals?.blood_pressure_systolic).toBe(112)
    expect(outcome.progression[2].snapshot).toEqual(outcome.progression[1].snapshot)
  })

  it('summarizes against the original baseline', () => {
    const outcome = runWeeklySimulation({ baseline: HEALTHY, rows: csv, durationWeeks: 3, now: NOW })
    expect(outcome.baselineReport.interpretation.overallScore).toBe(100)
    expect(outcome.finalReport).toBe(outcome.progression[2].report)
    expect(outcome.improvements).toEqual(['Blood pressure reduced by 6 mmHg systolic'])
    expect(outcome.recommendations).toEqual(GENERAL)
  })

  it('accepts parsed rows', () => {
    const outcome = runWeeklySimulation({
      baseline: HEALTHY,
      rows: [{ week: 1, values: { heart_rate: { kind: 'absolute', value: 110 } } }],
      durationWeeks: 1,
      now: NOW,
    })
    expect(outcome.finalReport.interpretation.riskFactors).toEqual(['Tachycardia (fast heart rate)'])
  })

  it('rejects empty weekly data', () => {
    expect(() => runWeeklySimulation({ baseline: HEALTHY, rows: [], durationWeeks: 2 })).toThrow(TwinValidationError)
    expect(() => runWeeklySimulation({ baseline: HEALTHY, rows: 'week,heart_rate\n', durationWeeks: 2 }))
      .toThrow(TwinValidationError)
  })
})

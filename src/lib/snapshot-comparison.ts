// Comparison Calculator
// Before/after improvement statements

import { readNumber, roundTo, type ParameterCategory, type ParameterSnapshot } from './parameter-snapshot'

interface TrackedField {
  category: ParameterCategory
  field: string
  /** Direction that counts as an improvement */
  better: 'lower' | 'higher'
  /** Displayed precision; a gain that rounds to zero is not reported */
  decimals: number
  describe: (amount: number) => string
}

const TRACKED_FIELDS: readonly TrackedField[] = [
  {
    category: 'vitals',
    field: 'blood_pressure_systolic',
    better: 'lower',
    decimals: 2,
    describe: r => `Blood pressure reduced by ${r} mmHg systolic`,
  },
  {
    category: 'vitals',
    field: 'blood_pressure_diastolic',
    better: 'lower',
    decimals: 2,
    describe: r => `Blood pressure reduced by ${r} mmHg diastolic`,
  },
  {
    category: 'metabolic',
    field: 'glucose_fasting',
    better: 'lower',
    decimals: 2,
    describe: r => `Fasting glucose reduced by ${r} mg/dL`,
  },
  {
    category: 'metabolic',
    field: 'hba1c',
    better: 'lower',
    decimals: 1,
    describe: r => `HbA1c reduced by ${r.toFixed(1)}%`,
  },
  {
    category: 'lipids',
    field: 'ldl',
    better: 'lower',
    decimals: 2,
    describe: r => `LDL cholesterol reduced by ${r} mg/dL`,
  },
  {
    category: 'lipids',
    field: 'hdl',
    better: 'higher',
    decimals: 2,
    describe: r => `HDL cholesterol increased by ${r} mg/dL`,
  },
]

/**
 * Improvement lines in fixed order. A field is skipped when either side lacks it
 * or when it did not move in the desired direction by at least its displayed precision.
 */
export function compareSnapshots(before: ParameterSnapshot, after: ParameterSnapshot): string[] {
  const improvements: string[] = []
  for (const tracked of TRACKED_FIELDS) {
    const from = readNumber(before, tracked.category, tracked.field)
    const to = readNumber(after, tracked.category, tracked.field)
    if (from === null || to === null) continue
    const gain = roundTo(tracked.better === 'lower' ? from - to : to - from, tracked.decimals)
    if (gain > 0) improvements.push(tracked.describe(gain))
  }
  return improvements
}

// Derived metrics
// BMI and eGFR
// Pure formulas over snapshot fields; any missing input yields null

import { readNumber, roundTo, type Gender, type ParameterSnapshot } from './parameter-snapshot'

/** weight_kg / height_m², one decimal */
export function computeBmi(weightKg: number | null, heightCm: number | null): number | null {
  if (weightKg === null || heightCm === null || heightCm <= 0) return null
  const heightM = heightCm / 100
  return roundTo(weightKg / (heightM * heightM), 1)
}

/**
 * MDRD estimate: 175 × Cr^-1.154 × age^-0.203 × 0.742 (female), one decimal.
 */
export function computeEgfr(creatinine: number | null, age: number | null, gender: Gender | null): number | null {
  if (creatinine === null || age === null || gender === null) return null
  if (creatinine <= 0 || age <= 0) return null
  const sexFactor = gender === 'F' ? 0.742 : 1
  return roundTo(175 * creatinine ** -1.154 * age ** -0.203 * sexFactor, 1)
}

/** Stored BMI when present, otherwise computed from height and weight */
export function resolveBmi(snapshot: ParameterSnapshot): number | null {
  const stored = readNumber(snapshot, 'physical', 'bmi')
  if (stored !== null) return stored
  return computeBmi(readNumber(snapshot, 'physical', 'weight_kg'), readNumber(snapshot, 'physical', 'height_cm'))
}

export function resolveEgfr(snapshot: ParameterSnapshot): number | null {
  return computeEgfr(
    readNumber(snapshot, 'metabolic', 'creatinine'),
    snapshot.demographics?.age ?? null,
    snapshot.demographics?.gender ?? null,
  )
}

// Parameter Reference Catalog
// Units and normal ranges
// Single source of truth for report annotation; loaded from data/reference-ranges.json

import { z } from 'zod'
import referenceTable from './data/reference-ranges.json'
import { TwinValidationError } from './errors'
import {
  CATEGORY_FIELDS,
  PARAMETER_CATEGORIES,
  type FieldValue,
  type ParameterCategory,
} from './parameter-snapshot'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface ReferenceRange {
  min: number
  max: number
  unit: string
}

/** L = below range, H = above range, N = within range, N/A = no value */
export type ParameterFlag = 'L' | 'H' | 'N' | 'N/A'

const referenceRangeSchema = z.object({
  min: z.number(),
  max: z.number(),
  unit: z.string(),
}).refine(r => r.min <= r.max, { message: 'min must not exceed max' })

const referenceTableSchema = z.record(z.string(), z.record(z.string(), referenceRangeSchema))

// ─── Catalog ────────────────────────────────────────────────────────────────

function loadCatalog(): Map<ParameterCategory, Map<string, ReferenceRange>> {
  const parsed = referenceTableSchema.safeParse(referenceTable)
  if (!parsed.success) {
    throw TwinValidationError.fromZod('Invalid reference range table', parsed.error)
  }
  const catalog = new Map<ParameterCategory, Map<string, ReferenceRange>>()
  for (const category of PARAMETER_CATEGORIES) {
    const entries = parsed.data[category] ?? {}
    const known = new Set<string>(CATEGORY_FIELDS[category])
    const ranges = new Map<string, ReferenceRange>()
    for (const [field, range] of Object.entries(entries)) {
      if (!known.has(field)) {
        throw new TwinValidationError('Invalid reference range table', [`${category}.${field}: not in vocabulary`])
      }
      ranges.set(field, range)
    }
    catalog.set(category, ranges)
  }
  return catalog
}

const CATALOG = loadCatalog()

export function getReferenceRange(category: ParameterCategory, field: string): ReferenceRange | undefined {
  return CATALOG.get(category)?.get(field)
}

/** Ranged fields of a category, in vocabulary order */
export function getRangedFields(category: ParameterCategory): string[] {
  const fields: readonly string[] = CATEGORY_FIELDS[category]
  const ranges = CATALOG.get(category)
  return fields.filter(field => ranges?.has(field) ?? false)
}

export function formatReferenceRange(range: ReferenceRange): string {
  return `${range.min}-${range.max}`
}

export function computeFlag(value: FieldValue | undefined, range: ReferenceRange): ParameterFlag {
  if (value === null || value === undefined) return 'N/A'
  if (typeof value !== 'number') return 'N'
  if (value < range.min) return 'L'
  if (value > range.max) return 'H'
  return 'N'
}

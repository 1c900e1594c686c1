import type { RawSpecs } from './extract-specs'
import { defaultFor, type SpecField, type SpecValue } from './spec-fields'

const toNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number')
    return Number.isFinite(value) ? value : undefined
  if (typeof value === 'boolean') return value ? 1 : 0
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim())
    return Number.isFinite(parsed) ? parsed : undefined
  }
  return undefined
}

const toText = (value: unknown): string | undefined => {
  if (typeof value === 'string') return value
  if (typeof value === 'boolean') return String(value)
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  return undefined
}

export const coerceField = (field: SpecField, value: unknown): SpecValue => {
  if (value === undefined || value === null) return defaultFor(field)
  const coerced = field.type === 'number' ? toNumber(value) : toText(value)
  return coerced ?? defaultFor(field)
}

/**
 * One value per declared field, defaulted and coerced to the declared type.
 * Keys the model invented are dropped.
 */
export const normalizeSpecs = (
  raw: RawSpecs,
  fields: SpecField[]
): Record<string, SpecValue> => {
  const specs: Record<string, SpecValue> = {}
  for (const field of fields)
    specs[field.key] = coerceField(field, raw[field.key])
  return specs
}

export const clamp = (value: number, min: number, max: number): number => Math.max(min, Math.min(max, value))

export const clampScore = (value: number): number => clamp(value, 0, 100)

export const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value)

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null
  return values.reduce((sum, v) => sum + v, 0) / values.length
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  const upper = sorted[mid] ?? 0
  if (sorted.length % 2 === 1) return upper
  const lower = sorted[mid - 1] ?? upper
  return (lower + upper) / 2
}

/**
 * Relative change of `value` against `reference` as a fraction (0.1 = +10%).
 * Returns null when either side is missing or the reference is not positive.
 */
export function relativeChange(value: number | null | undefined, reference: number | null | undefined): number | null {
  if (!isFiniteNumber(value) || !isFiniteNumber(reference) || reference <= 0) return null
  return (value - reference) / reference
}

/**
 * A single segment of a piecewise-linear curve.
 *
 * A band covers `from < x <= to` (the first band also covers `x === from`);
 * `to: null` means the band is open-ended.
 */
export type GraduatedBand = {
  from: number
  to: number | null
  start: number
  slope: number
  floor: number
}

export type PenaltyTier = {
  from: number
  to: number | null
  base: number
  rate: number
}

const covers = (to: number | null, x: number) => to === null || x <= to

/**
 * Score curve that starts at `start` when x reaches the band and falls by `slope`
 * per unit, never below the band's `floor`. Values below the first band map to
 * the first band's start.
 */
export function scoreFromBands(x: number, bands: readonly GraduatedBand[]): number {
  const first = bands[0]
  if (!first) return 0
  if (x <= first.from) return first.start
  const band = bands.find((b) => covers(b.to, x)) ?? bands[bands.length - 1] ?? first
  return Math.max(band.floor, band.start - (x - band.from) * band.slope)
}

/** Increasing penalty curve: `base + (x - from) * rate`, capped at `cap`. */
export function penaltyFromTiers(x: number, tiers: readonly PenaltyTier[], cap: number): number {
  const first = tiers[0]
  if (!first || x <= first.from) return 0
  const tier = tiers.find((t) => t.to === null || x < t.to) ?? tiers[tiers.length - 1] ?? first
  return Math.min(cap, Math.max(0, tier.base + (x - tier.from) * tier.rate))
}

import type { IntensityBuckets, IntensityDistribution } from './zones.types'

export const emptyBuckets = (): IntensityBuckets => ({
  z1Sec: 0,
  z2Sec: 0,
  z3Sec: 0,
  z4Sec: 0,
  z5Sec: 0,
})

export const accumulateBuckets = (
  a: IntensityBuckets,
  b: Partial<IntensityBuckets> | null | undefined,
): IntensityBuckets => {
  if (!b) return { ...a }
  return {
    z1Sec: a.z1Sec + (b.z1Sec ?? 0),
    z2Sec: a.z2Sec + (b.z2Sec ?? 0),
    z3Sec: a.z3Sec + (b.z3Sec ?? 0),
    z4Sec: a.z4Sec + (b.z4Sec ?? 0),
    z5Sec: a.z5Sec + (b.z5Sec ?? 0),
  }
}

export const totalSeconds = (b: IntensityBuckets): number => b.z1Sec + b.z2Sec + b.z3Sec + b.z4Sec + b.z5Sec

/** Low = zones 1-2, high = zones 4-5, as percentages of all zone time. */
export function intensityDistribution(b: IntensityBuckets): IntensityDistribution {
  const totalSec = totalSeconds(b)
  if (totalSec <= 0) return { lowIntensityPercent: 0, highIntensityPercent: 0, totalSec: 0 }
  return {
    lowIntensityPercent: ((b.z1Sec + b.z2Sec) / totalSec) * 100,
    highIntensityPercent: ((b.z4Sec + b.z5Sec) / totalSec) * 100,
    totalSec,
  }
}

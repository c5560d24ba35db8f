export type IntensityBuckets = {
  z1Sec: number
  z2Sec: number
  z3Sec: number
  z4Sec: number
  z5Sec: number
}

export type IntensityDistribution = {
  lowIntensityPercent: number // z1 + z2
  highIntensityPercent: number // z4 + z5
  totalSec: number
}

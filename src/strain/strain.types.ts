import type { IntensityBuckets } from '../types/zones.types'

export type ActivitySample = {
  readonly offsetSec: number
  readonly heartRate?: number | null
  readonly power?: number | null
}

export type Sex = 'female' | 'male' | 'unspecified'

export type AthleteProfile = {
  readonly restingHr: number
  readonly maxHr: number
  readonly ftp?: number | null
  readonly sex: Sex
}

export type StrainSource = 'heartRate' | 'power' | 'blended'

export type StrainBand = 'Light' | 'Moderate' | 'Hard' | 'Very Hard' | 'All Out'

export type StrainResult = {
  readonly trimp: number // minutes at maximal intensity
  readonly epoc: number
  readonly strain: number // 0-21
  readonly band: StrainBand
  readonly source: StrainSource | null // null when no sample carried usable data
  readonly durationMin: number
  readonly zoneSeconds: IntensityBuckets
}

export type PowerLoad = {
  readonly normalizedPower: number
  readonly intensityFactor: number
  readonly tss: number
  readonly durationSec: number
}

/** Relative deviations from baseline; any may be missing. */
export type RecoverySignal = {
  readonly hrvChange?: number | null
  readonly rhrChange?: number | null
  readonly sleepScore?: number | null
}

export type DailyStrain = {
  readonly date: string
  readonly activityCount: number
  readonly epoc: number
  readonly baseStrain: number
  readonly recoveryFactor: number
  readonly strain: number
  readonly band: StrainBand
}

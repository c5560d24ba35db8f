import { clamp, isFiniteNumber } from '../common/score.utils'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import type { IntensityBuckets } from '../types/zones.types'
import { accumulateBuckets, emptyBuckets } from '../types/zones.utils'
import type {
  ActivitySample,
  AthleteProfile,
  DailyStrain,
  PowerLoad,
  RecoverySignal,
  StrainBand,
  StrainResult,
  StrainSource,
} from './strain.types'

type StrainConfig = ReadinessConfig['strain']

/** Seconds each sample stands for: the gap to the next one, capped; the last gets `lastSampleSec`. */
export function sampleDurations(samples: readonly ActivitySample[], cfg: StrainConfig): number[] {
  return samples.map((s, i) => {
    const next = samples[i + 1]
    if (!next) return cfg.lastSampleSec
    return clamp(next.offsetSec - s.offsetSec, 0, cfg.maxSampleGapSec)
  })
}

export function heartRateReserve(hr: number, profile: AthleteProfile): number | null {
  const range = profile.maxHr - profile.restingHr
  if (range <= 0 || profile.restingHr <= 0) return null
  return clamp((hr - profile.restingHr) / range, 0, 1)
}

type SampleIntensity = { value: number; usedHr: boolean; usedPower: boolean }

export function sampleIntensity(
  sample: ActivitySample,
  profile: AthleteProfile,
  cfg: StrainConfig,
): SampleIntensity | null {
  const hrr = isFiniteNumber(sample.heartRate) ? heartRateReserve(sample.heartRate, profile) : null
  const ftp = profile.ftp
  const pf = isFiniteNumber(sample.power) && isFiniteNumber(ftp) && ftp > 0 ? Math.max(0, sample.power / ftp) : null

  if (hrr !== null && pf !== null) {
    const blended = cfg.hrBlendWeight * hrr + (1 - cfg.hrBlendWeight) * pf
    return { value: clamp(blended, 0, 1), usedHr: true, usedPower: true }
  }
  if (hrr !== null) return { value: hrr, usedHr: true, usedPower: false }
  if (pf !== null) return { value: pf, usedHr: false, usedPower: true }
  return null
}

export function hrZoneIndex(hrr: number, bounds: readonly number[]): number {
  const idx = bounds.findIndex((upper) => hrr < upper)
  return idx === -1 ? bounds.length : idx
}

const ZONE_KEYS = ['z1Sec', 'z2Sec', 'z3Sec', 'z4Sec', 'z5Sec'] as const

function addZoneTime(zones: IntensityBuckets, zone: number, sec: number): IntensityBuckets {
  const key = ZONE_KEYS[Math.min(zone, ZONE_KEYS.length - 1)] ?? 'z5Sec'
  const delta: Partial<IntensityBuckets> = {}
  delta[key] = sec
  return accumulateBuckets(zones, delta)
}

export const epocFromTrimp = (trimp: number, cfg: StrainConfig): number =>
  cfg.epocCoefficient * Math.pow(Math.max(0, trimp), cfg.epocExponent)

/** Logarithmic map of EPOC onto 0..maxStrain; reaches the top at `epocMax`. */
export function strainFromEpoc(epoc: number, cfg: StrainConfig): number {
  const strain = (cfg.maxStrain * Math.log(Math.max(0, epoc) + 1)) / Math.log(cfg.epocMax + 1)
  return clamp(strain, 0, cfg.maxStrain)
}

export function strainBandFor(strain: number, bands: StrainConfig['bands']): StrainBand {
  if (strain <= bands.light) return 'Light'
  if (strain <= bands.moderate) return 'Moderate'
  if (strain <= bands.hard) return 'Hard'
  if (strain <= bands.veryHard) return 'Very Hard'
  return 'All Out'
}

function sourceOf(usedHr: boolean, usedPower: boolean): StrainSource | null {
  if (usedHr && usedPower) return 'blended'
  if (usedHr) return 'heartRate'
  if (usedPower) return 'power'
  return null
}

/**
 * Training impulse of one activity and its place on the strain scale.
 * Samples must be in ascending offset order.
 */
export function scoreActivity(
  samples: readonly ActivitySample[],
  profile: AthleteProfile,
  cfg: StrainConfig,
): StrainResult {
  const k = cfg.exponents[profile.sex]
  const durations = sampleDurations(samples, cfg)

  let weightedSec = 0
  let zones = emptyBuckets()
  let usedHr = false
  let usedPower = false

  samples.forEach((sample, i) => {
    const dt = durations[i] ?? 0
    const intensity = sampleIntensity(sample, profile, cfg)
    if (intensity) {
      weightedSec += Math.pow(intensity.value, k) * dt
      usedHr = usedHr || intensity.usedHr
      usedPower = usedPower || intensity.usedPower
    }
    const hrr = isFiniteNumber(sample.heartRate) ? heartRateReserve(sample.heartRate, profile) : null
    if (hrr !== null) zones = addZoneTime(zones, hrZoneIndex(hrr, cfg.hrReserveZoneBounds), dt)
  })

  const trimp = weightedSec / 60
  const epoc = epocFromTrimp(trimp, cfg)
  const strain = strainFromEpoc(epoc, cfg)
  return {
    trimp,
    epoc,
    strain,
    band: strainBandFor(strain, cfg.bands),
    source: sourceOf(usedHr, usedPower),
    durationMin: durations.reduce((sum, d) => sum + d, 0) / 60,
    zoneSeconds: zones,
  }
}

/** Fourth-root of the mean fourth power of the rolling average; plain average below one window. */
export function normalizedPower(powers: readonly number[], window: number): number | null {
  if (powers.length === 0) return null
  if (powers.length < window) return powers.reduce((sum, p) => sum + p, 0) / powers.length

  let rolling = 0
  let sumFourth = 0
  let count = 0
  powers.forEach((p, i) => {
    rolling += p
    const dropped = powers[i - window]
    if (dropped !== undefined) rolling -= dropped
    if (i >= window - 1) {
      sumFourth += Math.pow(rolling / window, 4)
      count++
    }
  })
  return Math.pow(sumFourth / count, 0.25)
}

export function powerTrainingLoad(
  samples: readonly ActivitySample[],
  ftp: number | null | undefined,
  cfg: StrainConfig,
): PowerLoad | null {
  if (!isFiniteNumber(ftp) || ftp <= 0) return null
  const powers = samples.map((s) => s.power).filter(isFiniteNumber)
  const np = normalizedPower(powers, cfg.normalizedPowerWindow)
  if (np === null) return null

  const durationSec = sampleDurations(samples, cfg).reduce((sum, d) => sum + d, 0)
  const intensityFactor = np / ftp
  const tss = ((durationSec * np * intensityFactor) / (ftp * 3600)) * 100
  return { normalizedPower: np, intensityFactor, tss, durationSec }
}

/** 1 ± `recoveryModulation`, from a weighted blend of recovery deviations clamped to [-1, 1]. */
export function recoveryFactor(signal: RecoverySignal | null, cfg: StrainConfig): number {
  if (!signal) return 1
  const w = cfg.recoverySignal
  const hrv = isFiniteNumber(signal.hrvChange) ? signal.hrvChange : 0
  const rhr = isFiniteNumber(signal.rhrChange) ? -signal.rhrChange : 0
  const sleep = isFiniteNumber(signal.sleepScore) ? (signal.sleepScore - w.sleepCenter) / w.sleepSpread : 0

  const blended = clamp(w.hrvWeight * hrv + w.rhrWeight * rhr + w.sleepWeight * sleep, -1, 1)
  return 1 + cfg.recoveryModulation * blended
}

/** Day strain from the summed EPOC of its activities, optionally modulated by recovery. */
export function dailyStrain(
  date: string,
  activities: readonly StrainResult[],
  signal: RecoverySignal | null,
  cfg: StrainConfig,
): DailyStrain {
  const epoc = activities.reduce((sum, a) => sum + a.epoc, 0)
  const baseStrain = strainFromEpoc(epoc, cfg)
  const factor = recoveryFactor(signal, cfg)
  const strain = clamp(baseStrain * factor, 0, cfg.maxStrain)
  return {
    date,
    activityCount: activities.length,
    epoc,
    baseStrain,
    recoveryFactor: factor,
    strain,
    band: strainBandFor(strain, cfg.bands),
  }
}

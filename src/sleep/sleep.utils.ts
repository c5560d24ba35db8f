import { addDays } from '../common/day-key'
import { clampScore, isFiniteNumber } from '../common/score.utils'
import { combineSubScores, rebalanceWeights } from '../common/weight-rebalance'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import type { DailyMetric } from '../types/daily-metric.types'
import type { SleepBand, SleepComponent, SleepDebt, SleepNight, SleepResult, UsualSleepTimes } from './sleep.types'

type SleepConfig = ReadinessConfig['sleep']

const MINUTES_PER_DAY = 1440

/** Shortest distance between two clock times, across midnight. */
export function circularMinuteDiff(a: number, b: number): number {
  const d = Math.abs(a - b) % MINUTES_PER_DAY
  return Math.min(d, MINUTES_PER_DAY - d)
}

/** Circular mean of clock times; 23:30 and 00:30 average to 00:00. */
export function usualTimeOfDay(minutes: readonly number[]): number | null {
  if (minutes.length === 0) return null
  let sin = 0
  let cos = 0
  for (const m of minutes) {
    const angle = (m / MINUTES_PER_DAY) * 2 * Math.PI
    sin += Math.sin(angle)
    cos += Math.cos(angle)
  }
  if (Math.abs(sin) < 1e-9 && Math.abs(cos) < 1e-9) return null
  const angle = Math.atan2(sin, cos)
  const m = Math.round((angle / (2 * Math.PI)) * MINUTES_PER_DAY)
  return ((m % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY
}

export function usualSleepTimes(nights: readonly SleepNight[]): UsualSleepTimes {
  return {
    bedtimeMin: usualTimeOfDay(nights.map((n) => n.bedtimeMin).filter(isFiniteNumber)),
    wakeTimeMin: usualTimeOfDay(nights.map((n) => n.wakeTimeMin).filter(isFiniteNumber)),
  }
}

const positive = (v: number | null | undefined): v is number => isFiniteNumber(v) && v > 0

export function performanceScore(night: SleepNight, needHours: number): number | null {
  if (!isFiniteNumber(night.asleepHours) || needHours <= 0) return null
  return clampScore(Math.min(100, (night.asleepHours / needHours) * 100))
}

export function efficiencyScore(night: SleepNight): number | null {
  if (!isFiniteNumber(night.asleepHours) || !positive(night.inBedHours)) return null
  return clampScore((night.asleepHours / night.inBedHours) * 100)
}

export function stageQualityScore(night: SleepNight, cfg: SleepConfig['stageQuality']): number | null {
  if (!positive(night.asleepHours)) return null
  if (!isFiniteNumber(night.deepHours) && !isFiniteNumber(night.remHours)) return null

  const share = ((night.deepHours ?? 0) + (night.remHours ?? 0)) / night.asleepHours
  if (share >= cfg.excellentShare) return 100
  if (share >= cfg.fairShare) {
    return 50 + ((share - cfg.fairShare) / (cfg.excellentShare - cfg.fairShare)) * 50
  }
  return clampScore((share / cfg.fairShare) * 50)
}

function tierScore(value: number, tiers: readonly (readonly [number, number])[], floor: number): number {
  const tier = tiers.find(([max]) => value <= max)
  return tier ? tier[1] : floor
}

export function restfulnessScore(night: SleepNight, cfg: SleepConfig): number | null {
  if (!isFiniteNumber(night.wakeEvents)) return null
  return tierScore(night.wakeEvents, cfg.wakeEventTiers, cfg.restfulnessFloor)
}

export function timingScore(night: SleepNight, usual: UsualSleepTimes, cfg: SleepConfig): number | null {
  const deviations: number[] = []
  if (isFiniteNumber(night.bedtimeMin) && usual.bedtimeMin !== null) {
    deviations.push(circularMinuteDiff(night.bedtimeMin, usual.bedtimeMin))
  }
  if (isFiniteNumber(night.wakeTimeMin) && usual.wakeTimeMin !== null) {
    deviations.push(circularMinuteDiff(night.wakeTimeMin, usual.wakeTimeMin))
  }
  if (deviations.length === 0) return null
  const meanDeviation = deviations.reduce((sum, d) => sum + d, 0) / deviations.length
  return tierScore(meanDeviation, cfg.timingTiers, cfg.timingFloor)
}

export function sleepBandFor(score: number, bands: SleepConfig['bands']): SleepBand {
  if (score >= bands.optimal) return 'Optimal'
  if (score >= bands.good) return 'Good'
  if (score >= bands.fair) return 'Fair'
  return 'Pay Attention'
}

/**
 * Composite sleep score. Need comes from the sleep-duration baseline, falling
 * back to the configured default; missing components lose their weight.
 */
export function scoreSleep(
  night: SleepNight,
  baselineHours: number | null,
  usual: UsualSleepTimes,
  cfg: SleepConfig,
): SleepResult {
  const needHours = baselineHours !== null && baselineHours > 0 ? baselineHours : cfg.defaultNeedHours

  const readings: [SleepComponent, number | null][] = [
    ['performance', performanceScore(night, needHours)],
    ['efficiency', efficiencyScore(night)],
    ['stageQuality', stageQualityScore(night, cfg.stageQuality)],
    ['restfulness', restfulnessScore(night, cfg)],
    ['timing', timingScore(night, usual, cfg)],
  ]
  const subScores = rebalanceWeights(
    readings.map(([name, score]) => ({
      name,
      score: score ?? 50,
      available: score !== null,
      defaultWeight: cfg.weights[name],
    })),
  )

  const score = Math.round(clampScore(combineSubScores(subScores, 50)))
  return { date: night.date, score, band: sleepBandFor(score, cfg.bands), needHours, subScores }
}

/** Hours short of need, summed over the nights with data in the window ending on `date`. */
export function computeSleepDebt(
  history: readonly DailyMetric[],
  date: string,
  needHours: number,
  windowDays: number,
): SleepDebt {
  const start = addDays(date, -(windowDays - 1))
  const hours = history
    .filter((m) => m.date >= start && m.date <= date)
    .map((m) => m.sleepHours)
    .filter(isFiniteNumber)

  const debtHours = hours.reduce((sum, h) => sum + Math.max(0, needHours - h), 0)
  return { date, windowDays, needHours, nightsCounted: hours.length, debtHours }
}

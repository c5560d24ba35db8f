import { addDays } from '../common/day-key'
import { isFiniteNumber, mean, median } from '../common/score.utils'
import { TRACKED_METRICS } from '../types/daily-metric.types'
import type { DailyMetric, TrackedMetric } from '../types/daily-metric.types'
import type { Baseline, BaselineOptions, BaselineSet, HrvStability, HrvTrend, HrvVariability } from './baseline.types'

/** Days strictly before `today` and no older than `days` days. */
export function trailingWindow(history: readonly DailyMetric[], today: string, days: number): DailyMetric[] {
  const start = addDays(today, -days)
  return history.filter((m) => m.date >= start && m.date < today)
}

export function metricValues(days: readonly DailyMetric[], field: TrackedMetric): number[] {
  const values: number[] = []
  for (const day of days) {
    const v = day[field]
    if (isFiniteNumber(v)) values.push(v)
  }
  return values
}

export function computeBaseline(values: readonly number[], windowDays: number, minSamples: number): Baseline | null {
  const avg = mean(values)
  if (avg === null || values.length < minSamples) return null
  return { mean: avg, sampleCount: values.length, windowDays }
}

export function hrvStabilityFor(cv: number): HrvStability {
  if (cv < 5) return 'excellent'
  if (cv < 10) return 'good'
  if (cv < 15) return 'moderate'
  return 'poor'
}

export function computeHrvVariability(values: readonly number[], minSamples: number): HrvVariability | null {
  const avg = mean(values)
  if (avg === null || avg <= 0 || values.length < minSamples) return null
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / values.length
  const coefficientOfVariation = (Math.sqrt(variance) / avg) * 100
  return { coefficientOfVariation, stability: hrvStabilityFor(coefficientOfVariation) }
}

export function computeHrvTrend(
  shortTerm: Baseline | null,
  longTermValues: readonly number[],
  minSamples: number,
  thresholdPct: number,
): HrvTrend | null {
  if (!shortTerm || longTermValues.length < minSamples) return null
  const longTermMedian = median(longTermValues)
  if (longTermMedian === null || longTermMedian <= 0) return null

  const changePercent = ((shortTerm.mean - longTermMedian) / longTermMedian) * 100
  const direction = changePercent > thresholdPct ? 'improving' : changePercent < -thresholdPct ? 'declining' : 'stable'
  return { direction, changePercent, shortTermMean: shortTerm.mean, longTermMedian }
}

/**
 * Rolling reference values for `today`, built from the trailing window that ends
 * the day before. A field's baseline is null unless enough days carry it.
 */
export function computeBaselineSet(history: readonly DailyMetric[], today: string, opts: BaselineOptions): BaselineSet {
  const window = trailingWindow(history, today, opts.windowDays)

  const entries = TRACKED_METRICS.map(
    (field) => [field, computeBaseline(metricValues(window, field), opts.windowDays, opts.minSamples)] as const,
  )
  const baselines: Record<TrackedMetric, Baseline | null> = {
    hrvMs: null,
    rhrBpm: null,
    sleepHours: null,
    sleepScore: null,
    respiratoryRate: null,
  }
  for (const [field, baseline] of entries) baselines[field] = baseline

  const hrvWindow = metricValues(window, 'hrvMs')
  const longWindow = metricValues(trailingWindow(history, today, opts.longWindowDays), 'hrvMs')

  return {
    today,
    windowStart: addDays(today, -opts.windowDays),
    windowEnd: addDays(today, -1),
    baselines,
    hrvVariability: computeHrvVariability(hrvWindow, opts.minSamples),
    hrvTrend: computeHrvTrend(baselines.hrvMs, longWindow, opts.minSamples, opts.trendThresholdPct),
  }
}

export const findMetric = (history: readonly DailyMetric[], date: string): DailyMetric | undefined =>
  history.find((m) => m.date === date)

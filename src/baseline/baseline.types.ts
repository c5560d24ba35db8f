import type { TrackedMetric } from '../types/daily-metric.types'

export type Baseline = {
  readonly mean: number
  readonly sampleCount: number
  readonly windowDays: number
}

export type HrvStability = 'excellent' | 'good' | 'moderate' | 'poor'

export type HrvVariability = {
  readonly coefficientOfVariation: number // percent
  readonly stability: HrvStability
}

export type HrvTrendDirection = 'improving' | 'stable' | 'declining'

export type HrvTrend = {
  readonly direction: HrvTrendDirection
  readonly changePercent: number
  readonly shortTermMean: number
  readonly longTermMedian: number
}

export type BaselineSet = {
  readonly today: string
  readonly windowStart: string
  readonly windowEnd: string
  readonly baselines: Readonly<Record<TrackedMetric, Baseline | null>>
  readonly hrvVariability: HrvVariability | null
  readonly hrvTrend: HrvTrend | null
}

export type BaselineOptions = {
  windowDays: number
  minSamples: number
  longWindowDays: number
  trendThresholdPct: number
}

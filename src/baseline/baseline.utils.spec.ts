import type { DailyMetric } from '../types/daily-metric.types'
import { baselineSetSchema } from './baseline.schema'
import { computeBaselineSet, computeHrvTrend, computeHrvVariability, trailingWindow } from './baseline.utils'

const opts = { windowDays: 7, minSamples: 3, longWindowDays: 30, trendThresholdPct: 5 }

const day = (date: string, values: Partial<DailyMetric> = {}): DailyMetric => ({
  date,
  illnessSuspected: false,
  ...values,
})

describe('computeBaselineSet', () => {
  it('averages the seven days before today and ignores today itself', () => {
    const history = [
      day('2024-01-01', { hrvMs: 999 }), // outside the window
      day('2024-01-02', { hrvMs: 60, rhrBpm: 50 }),
      day('2024-01-05', { hrvMs: 70, rhrBpm: 52 }),
      day('2024-01-08', { hrvMs: 80, rhrBpm: 54 }),
      day('2024-01-09', { hrvMs: 10, rhrBpm: 90 }), // today
    ]

    const result = computeBaselineSet(history, '2024-01-09', opts)

    expect(baselineSetSchema.safeParse(result).success).toBe(true)
    expect(result.windowStart).toBe('2024-01-02')
    expect(result.windowEnd).toBe('2024-01-08')
    expect(result.baselines.hrvMs).toEqual({ mean: 70, sampleCount: 3, windowDays: 7 })
    expect(result.baselines.rhrBpm).toEqual({ mean: 52, sampleCount: 3, windowDays: 7 })
  })

  it('reports a baseline as unavailable below three samples', () => {
    const history = [day('2024-01-06', { hrvMs: 60, sleepHours: 7 }), day('2024-01-07', { hrvMs: 62 })]

    const result = computeBaselineSet(history, '2024-01-08', opts)

    expect(result.baselines.hrvMs).toBeNull()
    expect(result.baselines.sleepHours).toBeNull()
    expect(result.hrvVariability).toBeNull()
    expect(result.hrvTrend).toBeNull()
  })

  it('skips days where a field is missing', () => {
    const history = [
      day('2024-01-04', { sleepHours: 7 }),
      day('2024-01-05', { sleepHours: null }),
      day('2024-01-06', { sleepHours: 8 }),
      day('2024-01-07', { sleepHours: 9 }),
    ]

    const result = computeBaselineSet(history, '2024-01-08', opts)

    expect(result.baselines.sleepHours).toEqual({ mean: 8, sampleCount: 3, windowDays: 7 })
  })

  it('returns only empty baselines for an empty history', () => {
    const result = computeBaselineSet([], '2024-01-08', opts)
    expect(Object.values(result.baselines).every((b) => b === null)).toBe(true)
  })
})

describe('trailingWindow', () => {
  it('keeps the configured number of days before today', () => {
    const history = ['2024-01-01', '2024-01-02', '2024-01-03', '2024-01-04'].map((d) => day(d))
    expect(trailingWindow(history, '2024-01-04', 2).map((m) => m.date)).toEqual(['2024-01-02', '2024-01-03'])
  })
})

describe('HRV statistics', () => {
  it('buckets the coefficient of variation', () => {
    // mean 50, population sd 10 => cv 20%
    expect(computeHrvVariability([40, 60, 40, 60], 3)).toEqual({ coefficientOfVariation: 20, stability: 'poor' })
    expect(computeHrvVariability([50, 50, 50], 3)).toEqual({ coefficientOfVariation: 0, stability: 'excellent' })
  })

  it('compares the short-term mean with the long-term median', () => {
    const shortTerm = { mean: 55, sampleCount: 7, windowDays: 7 }
    expect(computeHrvTrend(shortTerm, [40, 50, 60], 3, 5)?.direction).toBe('improving')
    expect(computeHrvTrend({ ...shortTerm, mean: 51 }, [40, 50, 60], 3, 5)?.direction).toBe('stable')
    expect(computeHrvTrend({ ...shortTerm, mean: 45 }, [40, 50, 60], 3, 5)?.changePercent).toBeCloseTo(-10, 10)
    expect(computeHrvTrend(null, [40, 50, 60], 3, 5)).toBeNull()
  })
})

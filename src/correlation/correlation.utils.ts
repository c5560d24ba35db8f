import { NonFiniteSeriesValueError, SeriesLengthMismatchError } from '../common/readiness.errors'
import { clamp } from '../common/score.utils'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import type {
  CorrelationOutcome,
  CorrelationSignificance,
  CorrelationTrend,
  DatedValue,
  PairedSeries,
} from './correlation.types'

type CorrelationConfig = ReadinessConfig['correlation']

const isConstant = (values: readonly number[]): boolean => values.every((v) => v === values[0])

/** Deviations from the mean, scaled into [-1, 1] so that squaring cannot overflow. */
function deviations(values: readonly number[]): number[] {
  const avg = values.reduce((sum, v) => sum + v, 0) / values.length
  const centred = values.map((v) => v - avg)
  const scale = centred.reduce((max, d) => Math.max(max, Math.abs(d)), 0)
  return scale > 0 ? centred.map((d) => d / scale) : centred
}

function assertFinite(values: readonly number[], series: 'x' | 'y'): void {
  const index = values.findIndex((v) => !Number.isFinite(v))
  if (index !== -1) throw new NonFiniteSeriesValueError(series, index)
}

export function significanceFor(r: number, cfg: CorrelationConfig): CorrelationSignificance {
  const abs = Math.abs(r)
  if (abs >= cfg.strong) return 'strong'
  if (abs >= cfg.moderate) return 'moderate'
  if (abs >= cfg.weak) return 'weak'
  return 'none'
}

export function trendFor(r: number, deadband: number): CorrelationTrend {
  if (r > deadband) return 'positive'
  if (r < -deadband) return 'negative'
  return 'none'
}

/**
 * Pearson correlation of two equal-length series.
 * Unequal lengths and non-finite values are caller errors; too few samples or a
 * constant series only make the result unavailable.
 */
export function pearson(x: readonly number[], y: readonly number[], cfg: CorrelationConfig): CorrelationOutcome {
  if (x.length !== y.length) throw new SeriesLengthMismatchError(x.length, y.length)
  assertFinite(x, 'x')
  assertFinite(y, 'y')

  const n = x.length
  if (n < cfg.minSamples) return { available: false, reason: 'insufficient-samples', sampleSize: n }

  if (isConstant(x) || isConstant(y)) return { available: false, reason: 'zero-variance', sampleSize: n }

  const dx = deviations(x)
  const dy = deviations(y)

  let sxy = 0
  let sxx = 0
  let syy = 0
  for (let i = 0; i < n; i++) {
    const a = dx[i] ?? 0
    const b = dy[i] ?? 0
    sxy += a * b
    sxx += a * a
    syy += b * b
  }

  const denominator = Math.sqrt(sxx * syy)
  const ratio = sxy / denominator
  if (denominator === 0 || !Number.isFinite(ratio)) {
    return { available: false, reason: 'zero-variance', sampleSize: n }
  }

  const coefficient = clamp(ratio, -1, 1)
  return {
    available: true,
    coefficient,
    rSquared: coefficient * coefficient,
    sampleSize: n,
    significance: significanceFor(coefficient, cfg),
    trend: trendFor(coefficient, cfg.trendDeadband),
  }
}

/** Inner join of two dated series, ascending by date. */
export function pairByDate(xs: readonly DatedValue[], ys: readonly DatedValue[]): PairedSeries {
  const yByDate = new Map(ys.map((p) => [p.date, p.value]))
  const pairs = xs
    .filter((p) => yByDate.has(p.date))
    .map((p) => ({ date: p.date, x: p.value, y: yByDate.get(p.date) ?? Number.NaN }))
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))

  return { dates: pairs.map((p) => p.date), x: pairs.map((p) => p.x), y: pairs.map((p) => p.y) }
}

export function describeCorrelation(outcome: CorrelationOutcome, xLabel: string, yLabel: string): string {
  if (!outcome.available) {
    return outcome.reason === 'zero-variance'
      ? `${xLabel} or ${yLabel} did not vary over ${outcome.sampleSize} days, so no relationship can be measured.`
      : `Not enough paired days (${outcome.sampleSize}) to relate ${xLabel} and ${yLabel}.`
  }
  const stats = `(r = ${outcome.coefficient.toFixed(2)}, n = ${outcome.sampleSize})`
  if (outcome.significance === 'none' || outcome.trend === 'none') {
    return `No meaningful relationship between ${xLabel} and ${yLabel} ${stats}.`
  }
  const strength = outcome.significance.charAt(0).toUpperCase() + outcome.significance.slice(1)
  const direction = outcome.trend === 'positive' ? 'higher' : 'lower'
  return `${strength} ${outcome.trend} relationship: higher ${xLabel} goes with ${direction} ${yLabel} ${stats}.`
}

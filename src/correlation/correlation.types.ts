export type CorrelationSignificance = 'strong' | 'moderate' | 'weak' | 'none'

export type CorrelationTrend = 'positive' | 'negative' | 'none'

export type CorrelationResult = {
  readonly available: true
  readonly coefficient: number // -1..1
  readonly rSquared: number // 0..1
  readonly sampleSize: number
  readonly significance: CorrelationSignificance
  readonly trend: CorrelationTrend
}

export type CorrelationUnavailableReason = 'insufficient-samples' | 'zero-variance'

export type CorrelationUnavailable = {
  readonly available: false
  readonly reason: CorrelationUnavailableReason
  readonly sampleSize: number
}

export type CorrelationOutcome = CorrelationResult | CorrelationUnavailable

export type DatedValue = {
  readonly date: string
  readonly value: number
}

export type PairedSeries = {
  readonly dates: readonly string[]
  readonly x: readonly number[]
  readonly y: readonly number[]
}

import type { Baseline } from '../baseline/baseline.types'
import type { SubScore } from '../common/weight-rebalance'
import type { DailyMetric, TrackedMetric } from '../types/daily-metric.types'
import type { TrainingLoadPoint } from '../training-load/training-load.types'

export type RecoveryComponent = 'hrv' | 'rhr' | 'sleep' | 'respiratory' | 'form'

export type RecoveryBand = 'Optimal' | 'Good' | 'Fair' | 'Pay Attention'

export type ConfounderKind = 'illness' | 'alcohol'

export type ConfounderFinding = {
  readonly kind: ConfounderKind
  readonly detected: boolean
  readonly confidence: number // 0-100
  readonly penalty: number // points subtracted from the combined score
  readonly signals: readonly string[]
}

export type ConfounderRecord = {
  readonly applied: boolean
  readonly kind: ConfounderKind | null
  readonly penalty: number
  readonly findings: readonly ConfounderFinding[]
}

/** Relative changes against baseline as fractions; null when either side is missing. */
export type BaselineChanges = {
  readonly hrv: number | null
  readonly rhr: number | null
  readonly respiratory: number | null
}

export type RecoveryInput = {
  readonly date: string
  readonly metric: DailyMetric | null
  readonly baselines: Readonly<Record<TrackedMetric, Baseline | null>>
  /** Training-load point of the day before `date`. */
  readonly previousLoad: TrainingLoadPoint | null
}

export type RecoveryResult = {
  readonly date: string
  readonly score: number
  readonly band: RecoveryBand
  readonly baseScore: number
  readonly subScores: readonly SubScore<RecoveryComponent>[]
  readonly changes: BaselineChanges
  readonly confounder: ConfounderRecord
}

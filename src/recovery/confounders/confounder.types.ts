import type { SubScore } from '../../common/weight-rebalance'
import type { DailyMetric } from '../../types/daily-metric.types'
import type { BaselineChanges, ConfounderFinding, ConfounderKind, RecoveryComponent } from '../recovery.types'

export type ConfounderContext = {
  readonly metric: DailyMetric
  readonly changes: BaselineChanges
  readonly subScores: readonly SubScore<RecoveryComponent>[]
}

/**
 * Explains a physiological deviation by something other than training.
 * Detectors run in order; each sees the findings of those before it.
 */
export interface ConfounderDetector {
  readonly kind: ConfounderKind
  detect(ctx: ConfounderContext, prior: readonly ConfounderFinding[]): ConfounderFinding
}

export const RECOVERY_CONFOUNDERS = Symbol('RECOVERY_CONFOUNDERS')

export const notDetected = (kind: ConfounderKind, signals: readonly string[] = []): ConfounderFinding => ({
  kind,
  detected: false,
  confidence: 0,
  penalty: 0,
  signals,
})

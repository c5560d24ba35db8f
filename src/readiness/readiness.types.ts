import type { BaselineSet } from '../baseline/baseline.types'
import type { RiskResult } from '../overtraining-risk/overtraining-risk.types'
import type { RecoveryResult } from '../recovery/recovery.types'
import type { SleepDebt, SleepNight, SleepResult } from '../sleep/sleep.types'
import type { TrainingLoadSummary } from '../training-load/training-load.types'
import type { PhaseResult } from '../training-phase/training-phase.types'
import type { IntensityBuckets } from '../types/zones.types'

export type SnapshotOptions = {
  /** Last night's sleep detail; enables the sleep score. */
  sleepNight?: SleepNight | null
  /** Earlier nights, for usual bed and wake times. */
  previousNights?: readonly SleepNight[]
  /** Time in zones over the last 7 days; enables the phase. */
  intensity?: IntensityBuckets | null
  initialCtl?: number
  initialAtl?: number
}

export type ReadinessSnapshot = {
  readonly date: string
  readonly baselines: BaselineSet
  readonly trainingLoad: TrainingLoadSummary
  readonly recovery: RecoveryResult
  readonly recoveryAverage: number | null
  readonly sleep: SleepResult | null
  readonly sleepDebt: SleepDebt
  readonly risk: RiskResult
  readonly phase: PhaseResult | null
  readonly recommendation: RecommendationResult
}

export type TrainingRecommendation = 'Train Hard' | 'Train Moderate' | 'Train Easy' | 'Rest'

export type RecommendationInput = {
  /** Short-window HRV mean (ms). */
  rollingHrv: number | null
  /** Long-window HRV reference (ms). */
  hrvBaseline: number | null
  /** HRV coefficient of variation, percent. */
  hrvCv: number | null
  recoveryScore: number | null
  tsb: number | null
}

/** Each signal runs from -100 to 100, except recovery which is the 0-100 score (50 when unknown). */
export type RecommendationSignals = {
  readonly hrvTrend: number
  readonly hrvStability: number
  readonly recovery: number
  readonly form: number
}

export type RecommendationResult = {
  readonly recommendation: TrainingRecommendation
  readonly confidence: number
  readonly signals: RecommendationSignals
  readonly reasoning: string[]
  readonly description: string
  readonly suggestedTss: { readonly min: number; readonly max: number }
  readonly suggestedIntensityFactor: number
}

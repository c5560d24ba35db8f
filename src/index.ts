import 'reflect-metadata'

export { ReadinessModule } from './readiness/readiness.module'
export { ReadinessService } from './readiness/readiness.service'
export { buildSnapshot } from './readiness/readiness.snapshot'
export {
  formSignal,
  hrvStabilitySignal,
  hrvTrendSignal,
  quickReadiness,
  recommendTraining,
  signalClarity,
} from './readiness/readiness.recommendation'
export type {
  ReadinessSnapshot,
  RecommendationInput,
  RecommendationResult,
  RecommendationSignals,
  SnapshotOptions,
  TrainingRecommendation,
} from './readiness/readiness.types'

export { ReadinessConfigModule } from './config/readiness-config.module'
export type { ReadinessModuleOptions } from './config/readiness-config.module'
export { READINESS_CONFIG, defaultReadinessConfig, readinessConfigFromEnv, resolveReadinessConfig } from './config/readiness-config'
export type { ReadinessConfig, ReadinessConfigInput } from './config/readiness-config.schema'

export {
  InvalidMetricsInputError,
  InvalidReadinessConfigError,
  NonFiniteSeriesValueError,
  ReadinessContractError,
  SeriesLengthMismatchError,
} from './common/readiness.errors'
export type { ReadinessErrorCode } from './common/readiness.errors'
export { combineSubScores, rebalanceWeights } from './common/weight-rebalance'
export type { SubScore, SubScoreInput } from './common/weight-rebalance'

export type { DailyMetric, DailyStress, TrackedMetric } from './types/daily-metric.types'
export type { IntensityBuckets, IntensityDistribution } from './types/zones.types'
export { intensityDistribution } from './types/zones.utils'
export { dailyMetricSchema, dailyHistorySchema, dailyStressSchema, intensityBucketsSchema } from './types/daily-metric.schema'

export { BaselineService } from './baseline/baseline.service'
export { computeBaselineSet, computeHrvTrend, computeHrvVariability } from './baseline/baseline.utils'
export type { Baseline, BaselineSet, HrvTrend, HrvVariability } from './baseline/baseline.types'

export { TrainingLoadService } from './training-load/training-load.service'
export { classifyForm, foldTrainingLoad, stressFromMetrics, toDailySeries } from './training-load/training-load.fold'
export type { FormState, TrainingLoadPoint, TrainingLoadSummary } from './training-load/training-load.types'

export { RecoveryService } from './recovery/recovery.service'
export { scoreRecovery } from './recovery/recovery.score'
export { RECOVERY_CONFOUNDERS } from './recovery/confounders/confounder.types'
export type { ConfounderContext, ConfounderDetector } from './recovery/confounders/confounder.types'
export { AlcoholDetector } from './recovery/confounders/alcohol.detector'
export { IllnessDetector } from './recovery/confounders/illness.detector'
export { defaultConfounderDetectors } from './recovery/confounders/confounder.factory'
export type { ConfounderFinding, RecoveryBand, RecoveryInput, RecoveryResult } from './recovery/recovery.types'

export { SleepService } from './sleep/sleep.service'
export { computeSleepDebt, scoreSleep, usualSleepTimes } from './sleep/sleep.utils'
export type { SleepBand, SleepDebt, SleepNight, SleepResult } from './sleep/sleep.types'

export { StrainService } from './strain/strain.service'
export { dailyStrain, powerTrainingLoad, scoreActivity } from './strain/strain.utils'
export type {
  ActivitySample,
  AthleteProfile,
  DailyStrain,
  PowerLoad,
  RecoverySignal,
  StrainBand,
  StrainResult,
} from './strain/strain.types'

export { OvertrainingRiskService } from './overtraining-risk/overtraining-risk.service'
export { assessOvertrainingRisk } from './overtraining-risk/overtraining-risk.rules'
export type { RiskFactor, RiskInput, RiskLevel, RiskResult } from './overtraining-risk/overtraining-risk.types'

export { TrainingPhaseService } from './training-phase/training-phase.service'
export { classifyPhase, detectPhase } from './training-phase/training-phase.rules'
export type { PhaseResult, TrainingPhase } from './training-phase/training-phase.types'

export { CorrelationService } from './correlation/correlation.service'
export { describeCorrelation, pairByDate, pearson } from './correlation/correlation.utils'
export type { CorrelationInsight } from './correlation/correlation.service'
export type { CorrelationOutcome, CorrelationResult, CorrelationUnavailable, DatedValue } from './correlation/correlation.types'

import { clamp, isFiniteNumber, relativeChange } from '../common/score.utils'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import type {
  RecommendationInput,
  RecommendationResult,
  RecommendationSignals,
  TrainingRecommendation,
} from './readiness.types'

type RecommendationConfig = ReadinessConfig['recommendation']

type TrainingPlan = Pick<RecommendationResult, 'description' | 'suggestedTss' | 'suggestedIntensityFactor'>

export const TRAINING_PLANS: Record<TrainingRecommendation, TrainingPlan> = {
  'Train Hard': {
    description: 'Your body is primed for a challenging workout. High-intensity or long sessions are appropriate.',
    suggestedTss: { min: 100, max: 200 },
    suggestedIntensityFactor: 0.85,
  },
  'Train Moderate': {
    description: 'Good conditions for a standard training day. Moderate intensity recommended.',
    suggestedTss: { min: 50, max: 100 },
    suggestedIntensityFactor: 0.7,
  },
  'Train Easy': {
    description: 'Some fatigue signals detected. Keep intensity low and focus on technique or active recovery.',
    suggestedTss: { min: 20, max: 50 },
    suggestedIntensityFactor: 0.55,
  },
  Rest: {
    description: 'Multiple fatigue indicators suggest rest is needed. Consider a complete rest day or very light activity.',
    suggestedTss: { min: 0, max: 20 },
    suggestedIntensityFactor: 0.4,
  },
}

export const LIMITED_DATA_NOTE = 'Note: Limited data available - confidence reduced'

// `|| 0` folds -0 into 0
const toSignal = (value: number): number => Math.trunc(clamp(value, -100, 100)) || 0

const hrvChangePct = (input: RecommendationInput): number | null => {
  const change = relativeChange(input.rollingHrv, input.hrvBaseline)
  return change === null ? null : change * 100
}

export function hrvTrendSignal(rollingHrv: number | null, hrvBaseline: number | null, cfg: RecommendationConfig): number {
  const change = relativeChange(rollingHrv, hrvBaseline)
  return change === null ? 0 : toSignal(change * 100 * cfg.hrvTrendScale)
}

/** Low day-to-day HRV variation reads positive, high variation negative. */
export function hrvStabilitySignal(cvPercent: number | null): number {
  if (!isFiniteNumber(cvPercent)) return 0
  if (cvPercent < 5) return toSignal(100 - cvPercent * 10)
  if (cvPercent < 10) return toSignal(50 - (cvPercent - 5) * 10)
  if (cvPercent < 15) return toSignal(-(cvPercent - 10) * 10)
  return toSignal(-50 - (cvPercent - 15) * 10)
}

export function formSignal(tsb: number | null, cfg: RecommendationConfig): number {
  return isFiniteNumber(tsb) ? toSignal(tsb * cfg.formScale) : 0
}

/** How much the signals agree with each other, 40-100. */
export function signalClarity(signals: RecommendationSignals, cfg: RecommendationConfig): number {
  const centred = [signals.hrvTrend, signals.hrvStability, signals.recovery - 50, signals.form]
  const positive = centred.filter((s) => s > cfg.clearSignalAbove).length
  const negative = centred.filter((s) => s < -cfg.clearSignalAbove).length
  const neutral = centred.length - positive - negative

  if (positive >= 3 || negative >= 3) return 80 + neutral * 5
  if (positive === 0 && negative === 0) return 60
  return 40
}

function dataQuality(signals: RecommendationSignals, input: RecommendationInput): number {
  const present = [signals.hrvTrend !== 0, signals.hrvStability !== 0, input.recoveryScore !== null, input.tsb !== null]
  return present.filter(Boolean).length * 25
}

/**
 * HRV-guided training recommendation. Fatigue markers are checked first, so a single
 * strong warning outweighs otherwise good signals.
 */
export function recommendTraining(input: RecommendationInput, cfg: RecommendationConfig): RecommendationResult {
  const signals: RecommendationSignals = {
    hrvTrend: hrvTrendSignal(input.rollingHrv, input.hrvBaseline, cfg),
    hrvStability: hrvStabilitySignal(input.hrvCv),
    recovery: isFiniteNumber(input.recoveryScore) ? input.recoveryScore : 50,
    form: formSignal(input.tsb, cfg),
  }

  const hrvPositive = signals.hrvTrend > cfg.hrvPositiveAbove
  const hrvNegative = signals.hrvTrend < cfg.hrvNegativeBelow
  const stable = signals.hrvStability > cfg.stableAbove
  const steady = signals.hrvStability > cfg.steadyAbove
  const unstable = signals.hrvStability < cfg.unstableBelow
  const recovered = signals.recovery >= cfg.recoveredAt
  const fatigued = signals.recovery < cfg.fatiguedBelow
  const fresh = signals.form > cfg.freshAbove
  const overreached = signals.form < cfg.overreachedBelow

  const change = hrvChangePct(input)
  const reasoning: string[] = []
  let recommendation: TrainingRecommendation

  if (hrvNegative || unstable || overreached) {
    recommendation = 'Rest'
    if (hrvNegative && change !== null) reasoning.push(`HRV is ${Math.abs(change).toFixed(1)}% below baseline`)
    if (unstable) reasoning.push('HRV variability is high (CV > 15%)')
    if (overreached) reasoning.push('Training load indicates functional overreaching')
  } else if (fatigued && !fresh) {
    recommendation = 'Train Easy'
    reasoning.push(`Recovery score is below ${cfg.fatiguedBelow}%`, 'Recommend low-intensity activity')
  } else if (hrvPositive && stable && recovered) {
    recommendation = 'Train Hard'
    if (change !== null) reasoning.push(`HRV is ${change.toFixed(1)}% above baseline`)
    reasoning.push('Excellent HRV stability (CV < 5%)', `Recovery score is ${signals.recovery}%`)
  } else if (hrvPositive && steady && signals.recovery >= cfg.adequateRecoveryAt) {
    recommendation = 'Train Moderate'
    reasoning.push('HRV trend is positive', `Recovery is adequate (${signals.recovery}%)`)
  } else if (recovered && fresh) {
    recommendation = 'Train Moderate'
    reasoning.push('Recovery and form are good')
    if (input.rollingHrv === null) reasoning.push('Limited HRV data - moderate recommendation')
  } else {
    recommendation = 'Train Easy'
    reasoning.push('Mixed readiness signals detected', 'Conservative approach recommended')
  }

  const quality = dataQuality(signals, input)
  if (quality < 50) reasoning.push(LIMITED_DATA_NOTE)

  return {
    recommendation,
    confidence: Math.min(100, Math.trunc((quality + signalClarity(signals, cfg)) / 2)),
    signals,
    reasoning,
    ...TRAINING_PLANS[recommendation],
  }
}

/** Recommendation from the recovery score alone, held back after a heavy day. */
export function quickReadiness(
  recoveryScore: number,
  yesterdayTss: number | null,
  cfg: RecommendationConfig,
): TrainingRecommendation {
  const { hardAt, moderateAt, easyAt, highTssAbove } = cfg.quick
  const heavyYesterday = (yesterdayTss ?? 0) > highTssAbove

  if (recoveryScore >= hardAt && !heavyYesterday) return 'Train Hard'
  if (recoveryScore >= moderateAt) return 'Train Moderate'
  if (recoveryScore >= easyAt) return 'Train Easy'
  return 'Rest'
}

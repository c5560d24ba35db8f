import type { ReadinessConfig } from '../config/readiness-config.schema'
import type { IntensityDistribution } from '../types/zones.types'
import type { PhaseResult, TrainingPhase } from './training-phase.types'

type PhaseConfig = ReadinessConfig['phase']

export const PHASE_RECOMMENDATIONS: Record<TrainingPhase, string> = {
  Base: 'Aerobic base block. Keep most sessions easy and grow volume gradually.',
  Build: 'Build block. Hold volume and add structured threshold work.',
  Peak: 'Peak block. Intensity is high, so protect recovery between key sessions.',
  Recovery: 'Recovery block. Keep load low until freshness returns.',
  Transition: 'No clear pattern. Pick a focus for the coming weeks.',
}

/** First matching rule wins. */
export function classifyPhase(
  weeklyTss: number,
  lowPct: number,
  highPct: number,
  cfg: PhaseConfig,
): { phase: TrainingPhase; confidence: number } {
  if (lowPct > cfg.baseLowIntensityPct && weeklyTss > cfg.baseMinWeeklyTss) {
    return { phase: 'Base', confidence: Math.min(lowPct / 100, cfg.baseConfidenceCap) }
  }
  if (weeklyTss < cfg.recoveryMaxWeeklyTss) {
    return { phase: 'Recovery', confidence: cfg.recoveryConfidence }
  }
  if (highPct > cfg.peakHighIntensityPct) {
    return { phase: 'Peak', confidence: Math.min(highPct / cfg.peakConfidenceDivisor, cfg.peakConfidenceCap) }
  }
  if (highPct >= cfg.buildMinHighIntensityPct && highPct <= cfg.peakHighIntensityPct && weeklyTss >= cfg.buildMinWeeklyTss) {
    return { phase: 'Build', confidence: cfg.buildConfidence }
  }
  return { phase: 'Transition', confidence: cfg.transitionConfidence }
}

export function detectPhase(weeklyTss: number, distribution: IntensityDistribution, cfg: PhaseConfig): PhaseResult {
  const { lowIntensityPercent, highIntensityPercent } = distribution
  const { phase, confidence } = classifyPhase(weeklyTss, lowIntensityPercent, highIntensityPercent, cfg)
  return {
    phase,
    confidence,
    weeklyTss,
    lowIntensityPercent,
    highIntensityPercent,
    recommendation: PHASE_RECOMMENDATIONS[phase],
  }
}

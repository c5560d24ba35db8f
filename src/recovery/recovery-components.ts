import { clampScore, isFiniteNumber } from '../common/score.utils'
import { penaltyFromTiers, scoreFromBands } from '../common/graduated-bands'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import type { TrainingLoadPoint } from '../training-load/training-load.types'
import type { RecoveryBand } from './recovery.types'

type RecoveryConfig = ReadinessConfig['recovery']

// Component scorers return null when their inputs are missing.

export function hrvComponent(change: number | null, cfg: RecoveryConfig): number | null {
  if (change === null) return null
  if (change >= 0) return 100
  return clampScore(scoreFromBands(-change, cfg.hrvDropBands))
}

export function rhrComponent(change: number | null, cfg: RecoveryConfig): number | null {
  if (change === null) return null
  if (change <= 0) return 100
  return clampScore(scoreFromBands(change, cfg.rhrRiseBands))
}

export function respiratoryComponent(change: number | null, cfg: RecoveryConfig): number | null {
  if (change === null) return null
  const bands = change > 0 ? cfg.respiratoryElevatedBands : cfg.respiratorySuppressedBands
  return clampScore(scoreFromBands(Math.abs(change), bands))
}

/** Precomputed sleep score when present, else duration against the sleep baseline. */
export function sleepComponent(
  sleepScore: number | null | undefined,
  sleepHours: number | null | undefined,
  baselineHours: number | null,
): number | null {
  if (isFiniteNumber(sleepScore)) return clampScore(sleepScore)
  if (!isFiniteNumber(sleepHours) || baselineHours === null || baselineHours <= 0) return null
  return clampScore(Math.min(100, (sleepHours / baselineHours) * 100))
}

export const tssPenalty = (tss: number, cfg: RecoveryConfig): number =>
  penaltyFromTiers(tss, cfg.tssPenaltyTiers, cfg.tssPenaltyCap)

/** ATL/CTL ratio score minus the previous day's stress penalty. */
export function formComponent(previous: TrainingLoadPoint | null, cfg: RecoveryConfig): number | null {
  if (!previous || previous.ctl <= 0) return null
  const base = scoreFromBands(previous.atl / previous.ctl, cfg.formRatioBands)
  return clampScore(base - tssPenalty(previous.tss, cfg))
}

export function recoveryBandFor(score: number, bands: RecoveryConfig['bands']): RecoveryBand {
  if (score >= bands.optimal) return 'Optimal'
  if (score >= bands.good) return 'Good'
  if (score >= bands.fair) return 'Fair'
  return 'Pay Attention'
}

import { clamp } from '../common/score.utils'
import type { ReadinessConfig, SeverityBand } from '../config/readiness-config.schema'
import type { RiskFactor, RiskFactorName, RiskInput, RiskLevel, RiskResult } from './overtraining-risk.types'

type RiskConfig = ReadinessConfig['risk']

export const ESCALATION_MESSAGE =
  'Several overtraining markers are elevated. Stop hard training, take rest days and seek advice if symptoms persist.'

export const CONTINUE_MESSAGE = 'No overtraining markers are elevated. Continue with the current plan.'

const FACTOR_MESSAGES: Record<RiskFactorName, string> = {
  recovery: 'Recovery has stayed low for several days. Schedule easier sessions until it rebounds.',
  hrvDeviation: 'HRV is well below baseline. Reduce intensity and prioritise rest.',
  rhrElevation: 'Resting heart rate is elevated. Consider a rest day and watch for signs of illness.',
  tsb: 'Training stress balance is deeply negative. Reduce training load this week.',
  sleepDebt: 'Sleep debt is building up. Extend sleep before adding training load.',
}

/** Severity of the first band the value crosses; bands are listed most severe first. */
export function severityFromBands(
  value: number,
  bands: readonly SeverityBand[],
  direction: 'below' | 'above',
  fallback: number,
): number {
  const hit = bands.find((b) => (direction === 'below' ? value < b.threshold : value > b.threshold))
  return hit ? hit.severity : fallback
}

type FactorRule = {
  name: RiskFactorName
  value: number | null
  bands: readonly SeverityBand[]
  direction: 'below' | 'above'
  describe: (v: number) => string
}

function factorRules(input: RiskInput, cfg: RiskConfig): FactorRule[] {
  return [
    {
      name: 'recovery',
      value: input.recoveryAverage,
      bands: cfg.recoveryBands,
      direction: 'below',
      describe: (v) => `Average recovery ${v.toFixed(0)} over the last ${cfg.recoveryAverageDays} days`,
    },
    {
      name: 'hrvDeviation',
      value: input.hrvChangePct,
      bands: cfg.hrvBands,
      direction: 'below',
      describe: (v) => `HRV ${v.toFixed(1)}% against baseline`,
    },
    {
      name: 'rhrElevation',
      value: input.rhrChangePct,
      bands: cfg.rhrBands,
      direction: 'above',
      describe: (v) => `Resting heart rate ${v >= 0 ? '+' : ''}${v.toFixed(1)}% against baseline`,
    },
    {
      name: 'tsb',
      value: input.tsb,
      bands: cfg.tsbBands,
      direction: 'below',
      describe: (v) => `Training stress balance ${v.toFixed(1)}`,
    },
    {
      name: 'sleepDebt',
      value: input.sleepDebtHours,
      bands: cfg.sleepDebtBands,
      direction: 'above',
      describe: (v) => `Sleep debt ${v.toFixed(1)} h`,
    },
  ]
}

export function riskLevelFor(score: number, levels: RiskConfig['levels']): RiskLevel {
  if (score < levels.moderate) return 'Low'
  if (score < levels.high) return 'Moderate'
  if (score < levels.critical) return 'High'
  return 'Critical'
}

/**
 * Weighted overtraining risk. Weights are fixed: a missing factor contributes
 * nothing rather than shifting its weight to the others.
 */
export function assessOvertrainingRisk(input: RiskInput, cfg: RiskConfig): RiskResult {
  const evaluated: RiskFactor[] = []
  for (const rule of factorRules(input, cfg)) {
    if (rule.value === null || !Number.isFinite(rule.value)) continue
    evaluated.push({
      name: rule.name,
      value: rule.value,
      severity: severityFromBands(rule.value, rule.bands, rule.direction, cfg.baselineSeverity),
      weight: cfg.weights[rule.name],
      description: rule.describe(rule.value),
    })
  }

  const score = clamp(
    evaluated.reduce((sum, f) => sum + f.weight * f.severity * 100, 0),
    0,
    100,
  )
  const level = riskLevelFor(score, cfg.levels)
  // stable sort keeps factor order on ties
  const factors = [...evaluated].sort((a, b) => b.severity - a.severity)

  return { score, level, factors, recommendation: recommendationFor(level, factors, cfg) }
}

function recommendationFor(level: RiskLevel, factors: readonly RiskFactor[], cfg: RiskConfig): string {
  if (level === 'Critical') return ESCALATION_MESSAGE
  const top = factors[0]
  if (!top || top.severity <= cfg.baselineSeverity) return CONTINUE_MESSAGE
  return FACTOR_MESSAGES[top.name]
}

import { defaultReadinessConfig } from '../config/readiness-config'
import {
  assessOvertrainingRisk,
  CONTINUE_MESSAGE,
  ESCALATION_MESSAGE,
  riskLevelFor,
  severityFromBands,
} from './overtraining-risk.rules'
import { riskResultSchema } from './overtraining-risk.schema'
import type { RiskInput } from './overtraining-risk.types'

const cfg = defaultReadinessConfig().risk

const none: RiskInput = {
  recoveryAverage: null,
  hrvChangePct: null,
  rhrChangePct: null,
  tsb: null,
  sleepDebtHours: null,
}

describe('assessOvertrainingRisk', () => {
  it('reports low risk when every marker is normal', () => {
    const result = assessOvertrainingRisk(
      { recoveryAverage: 85, hrvChangePct: 2, rhrChangePct: -1, tsb: 5, sleepDebtHours: 1 },
      cfg,
    )

    expect(riskResultSchema.safeParse(result).success).toBe(true)
    expect(result.score).toBeCloseTo(10, 10)
    expect(result.level).toBe('Low')
    expect(result.recommendation).toBe(CONTINUE_MESSAGE)
    expect(result.factors.every((f) => f.severity === 0.1)).toBe(true)
  })

  it('escalates when every marker is at its worst', () => {
    const result = assessOvertrainingRisk(
      { recoveryAverage: 45, hrvChangePct: -25, rhrChangePct: 20, tsb: -35, sleepDebtHours: 12 },
      cfg,
    )

    expect(result.score).toBeCloseTo(100, 10)
    expect(result.level).toBe('Critical')
    expect(result.recommendation).toBe(ESCALATION_MESSAGE)
  })

  it('orders factors by severity and keeps input order on ties', () => {
    const result = assessOvertrainingRisk(
      { recoveryAverage: 65, hrvChangePct: -12, rhrChangePct: 12, tsb: -25, sleepDebtHours: 4 },
      cfg,
    )

    // 25 * 0.4 + 25 * 0.4 + 20 * 0.7 + 20 * 0.7 + 10 * 0.3
    expect(result.score).toBeCloseTo(51, 10)
    expect(result.level).toBe('High')
    expect(result.factors.map((f) => f.name)).toEqual(['rhrElevation', 'tsb', 'recovery', 'hrvDeviation', 'sleepDebt'])
    expect(result.recommendation).toContain('Resting heart rate')
  })

  it('leaves out missing factors without rebalancing', () => {
    const result = assessOvertrainingRisk({ ...none, tsb: -35 }, cfg)

    expect(result.factors).toHaveLength(1)
    expect(result.score).toBeCloseTo(20, 10)
    expect(result.level).toBe('Low')
    expect(result.recommendation).toContain('Training stress balance')
  })

  it('has zero risk without any input', () => {
    const result = assessOvertrainingRisk(none, cfg)
    expect(result).toEqual({ score: 0, level: 'Low', factors: [], recommendation: CONTINUE_MESSAGE })
  })

  it('never decreases as a factor worsens', () => {
    const scores = [-5, -12, -17, -25].map((hrvChangePct) => assessOvertrainingRisk({ ...none, hrvChangePct }, cfg).score)
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeGreaterThan(scores[i - 1] ?? Infinity)
    }

    const debts = [0, 4, 8, 11].map((sleepDebtHours) => assessOvertrainingRisk({ ...none, sleepDebtHours }, cfg).score)
    expect([...debts].sort((a, b) => a - b)).toEqual(debts)
  })
})

describe('risk bands', () => {
  it('uses strict thresholds', () => {
    expect(severityFromBands(50, cfg.recoveryBands, 'below', 0.1)).toBe(0.7)
    expect(severityFromBands(49.9, cfg.recoveryBands, 'below', 0.1)).toBe(1)
    expect(severityFromBands(-20, cfg.hrvBands, 'below', 0.1)).toBe(0.7)
    expect(severityFromBands(15, cfg.rhrBands, 'above', 0.1)).toBe(0.7)
    expect(severityFromBands(3, cfg.sleepDebtBands, 'above', 0.1)).toBe(0.1)
  })

  it.each([
    [0, 'Low'],
    [24.9, 'Low'],
    [25, 'Moderate'],
    [50, 'High'],
    [75, 'Critical'],
  ] as const)('maps %p to %s', (score, level) => {
    expect(riskLevelFor(score, cfg.levels)).toBe(level)
  })
})

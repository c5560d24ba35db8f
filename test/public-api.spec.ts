import * as api from '../src'
import {
  defaultReadinessConfig,
  foldTrainingLoad,
  pairByDate,
  pearson,
  quickReadiness,
  rebalanceWeights,
  toDailySeries,
} from '../src'

const config = defaultReadinessConfig()
const exported = new Map<string, unknown>(Object.entries(api))

describe('package entry point', () => {
  it.each([
    'computeBaselineSet',
    'computeHrvTrend',
    'computeHrvVariability',
    'foldTrainingLoad',
    'toDailySeries',
    'stressFromMetrics',
    'classifyForm',
    'scoreRecovery',
    'scoreSleep',
    'computeSleepDebt',
    'usualSleepTimes',
    'scoreActivity',
    'dailyStrain',
    'powerTrainingLoad',
    'assessOvertrainingRisk',
    'detectPhase',
    'classifyPhase',
    'pearson',
    'pairByDate',
    'describeCorrelation',
    'rebalanceWeights',
    'combineSubScores',
    'intensityDistribution',
    'recommendTraining',
    'quickReadiness',
    'buildSnapshot',
  ])('exports %s', (name) => {
    expect(typeof exported.get(name)).toBe('function')
  })

  it('runs the calculations without a Nest container', () => {
    const series = toDailySeries([
      { date: '2024-01-01', tss: 10 },
      { date: '2024-01-03', tss: 20 },
    ])
    expect(series).toEqual([
      { date: '2024-01-01', tss: 10 },
      { date: '2024-01-02', tss: 0 },
      { date: '2024-01-03', tss: 20 },
    ])
    expect(foldTrainingLoad(series, config.trainingLoad).map((p) => p.date)).toEqual([
      '2024-01-01',
      '2024-01-02',
      '2024-01-03',
    ])

    const paired = pairByDate(
      series.map((p, i) => ({ date: p.date, value: i + 1 })),
      series.map((p, i) => ({ date: p.date, value: (i + 1) * 2 })),
    )
    const outcome = pearson(paired.x, paired.y, config.correlation)
    expect(outcome.available && outcome.coefficient).toBe(1)

    const weights = rebalanceWeights([
      { name: 'hrv', score: 80, available: true, defaultWeight: 0.3 },
      { name: 'rhr', score: 0, available: false, defaultWeight: 0.2 },
    ])
    expect(weights.map((w) => w.weight)).toEqual([1, 0])

    expect(quickReadiness(65, null, config.recommendation)).toBe('Train Moderate')
  })
})

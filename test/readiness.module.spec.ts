import 'reflect-metadata'
import { Test } from '@nestjs/testing'
import { dayKeyRange } from '../src/common/day-key'
import { InvalidReadinessConfigError, SeriesLengthMismatchError } from '../src/common/readiness.errors'
import { READINESS_CONFIG } from '../src/config/readiness-config'
import type { ReadinessConfig } from '../src/config/readiness-config.schema'
import { CorrelationService } from '../src/correlation/correlation.service'
import { ReadinessModule } from '../src/readiness/readiness.module'
import { ReadinessService } from '../src/readiness/readiness.service'
import { RECOVERY_CONFOUNDERS } from '../src/recovery/confounders/confounder.types'
import type { ConfounderDetector } from '../src/recovery/confounders/confounder.types'
import { RecoveryService } from '../src/recovery/recovery.service'
import { TrainingLoadService } from '../src/training-load/training-load.service'
import { TrainingPhaseService } from '../src/training-phase/training-phase.service'

describe('ReadinessModule', () => {
  describe('with default config', () => {
    let recovery: RecoveryService
    let trainingLoad: TrainingLoadService
    let phase: TrainingPhaseService
    let correlation: CorrelationService

    beforeAll(async () => {
      const mod = await Test.createTestingModule({
        imports: [ReadinessModule.forRoot()],
      }).compile()

      recovery = mod.get(RecoveryService)
      trainingLoad = mod.get(TrainingLoadService)
      phase = mod.get(TrainingPhaseService)
      correlation = mod.get(CorrelationService)
    })

    it('scores a day on every baseline with neutral form as optimal', () => {
      const result = recovery.score({
        date: '2024-01-03',
        metric: {
          date: '2024-01-03',
          hrvMs: 50,
          rhrBpm: 55,
          sleepHours: 8,
          respiratoryRate: 14,
          illnessSuspected: false,
        },
        baselines: {
          hrvMs: { mean: 50, sampleCount: 7, windowDays: 7 },
          rhrBpm: { mean: 55, sampleCount: 7, windowDays: 7 },
          sleepHours: { mean: 8, sampleCount: 7, windowDays: 7 },
          sleepScore: null,
          respiratoryRate: { mean: 14, sampleCount: 7, windowDays: 7 },
        },
        previousLoad: { date: '2024-01-02', tss: 40, ctl: 50, atl: 50, tsb: 0 },
      })

      expect(result.score).toBeGreaterThanOrEqual(90)
    })

    it('drops the hrv component below 30 for a 40% hrv drop', () => {
      const result = recovery.score({
        date: '2024-01-03',
        metric: { date: '2024-01-03', hrvMs: 30, illnessSuspected: false },
        baselines: {
          hrvMs: { mean: 50, sampleCount: 7, windowDays: 7 },
          rhrBpm: null,
          sleepHours: null,
          sleepScore: null,
          respiratoryRate: null,
        },
        previousLoad: null,
      })

      const hrv = result.subScores.find((s) => s.name === 'hrv')
      expect(hrv?.score).toBeLessThan(30)
      expect(hrv?.score).toBeCloseTo(27, 10)
    })

    it('converges atl near 100 and ctl near 76 after 60 days at 100 TSS', () => {
      const stress = dayKeyRange('2024-01-01', '2024-02-29').map((date) => ({ date, tss: 100 }))
      const points = trainingLoad.curve(stress)
      const summary = trainingLoad.summarize(points, '2024-02-29')

      expect(points).toHaveLength(60)
      expect(summary.point.atl).toBeCloseTo(99.98, 1)
      expect(summary.point.ctl).toBeCloseTo(76.03, 1)
      expect(summary.point.tsb).toBeLessThan(-20)
      expect(summary.form).toBe('fatigued')
    })

    it('detects a base phase for mostly easy volume', () => {
      const result = phase.detect(400, { lowIntensityPercent: 80, highIntensityPercent: 5, totalSec: 36000 })

      expect(result.phase).toBe('Base')
      expect(result.confidence).toBeGreaterThanOrEqual(0.8)
    })

    it('finds a perfect positive correlation for proportional series', () => {
      const outcome = correlation.correlate([1, 2, 3, 4, 5], [2, 4, 6, 8, 10])

      expect(outcome).toEqual({
        available: true,
        coefficient: 1,
        rSquared: 1,
        sampleSize: 5,
        significance: 'strong',
        trend: 'positive',
      })
    })

    it('rejects series of different lengths', () => {
      expect(() => correlation.correlate([1, 2, 3], [1, 2])).toThrow(SeriesLengthMismatchError)
    })
  })

  it('merges config overrides over the defaults', async () => {
    const mod = await Test.createTestingModule({
      imports: [ReadinessModule.forRoot({ config: { trainingLoad: { atlDays: 10 } } })],
    }).compile()

    const config = mod.get<ReadinessConfig>(READINESS_CONFIG)
    expect(config.trainingLoad.atlDays).toBe(10)
    expect(config.trainingLoad.ctlDays).toBe(42)
  })

  it('uses the confounder detectors it is given', async () => {
    const mod = await Test.createTestingModule({
      imports: [ReadinessModule.forRoot({ confounders: () => [] })],
    }).compile()

    expect(mod.get<ConfounderDetector[]>(RECOVERY_CONFOUNDERS)).toEqual([])
    expect(mod.get(ReadinessService)).toBeInstanceOf(ReadinessService)
  })

  it('registers illness before alcohol by default', async () => {
    const mod = await Test.createTestingModule({
      imports: [ReadinessModule.forRoot()],
    }).compile()

    expect(mod.get<ConfounderDetector[]>(RECOVERY_CONFOUNDERS).map((d) => d.kind)).toEqual(['illness', 'alcohol'])
  })

  it('fails to start with an invalid config', async () => {
    await expect(
      Test.createTestingModule({
        imports: [ReadinessModule.forRoot({ config: { trainingLoad: { ctlDays: -1 } } })],
      }).compile(),
    ).rejects.toThrow(InvalidReadinessConfigError)
  })
})

import { dayKeyRange } from '../common/day-key'
import {
  acuteChronicRatio,
  classifyForm,
  foldTrainingLoad,
  pointAtOrBefore,
  rollingStress,
  stressFromMetrics,
  toDailySeries,
} from './training-load.fold'
import { trainingLoadPointSchema } from './training-load.schema'

const opts = { ctlDays: 42, atlDays: 7 }
const thresholds = { freshTsb: 5, neutralTsbFloor: -10, fatiguedTsbFloor: -30 }

const constantSeries = (from: string, to: string, tss: number) => dayKeyRange(from, to).map((date) => ({ date, tss }))

describe('foldTrainingLoad', () => {
  it('returns no points for an empty series', () => {
    expect(foldTrainingLoad([], opts)).toEqual([])
  })

  it('stays at zero when every day has zero stress', () => {
    const points = foldTrainingLoad(constantSeries('2024-01-01', '2024-01-30', 0), opts)
    const last = points[points.length - 1]
    expect(last).toEqual({ date: '2024-01-30', tss: 0, ctl: 0, atl: 0, tsb: 0 })
  })

  it('approaches a constant load with fatigue reacting faster than fitness', () => {
    // 60 days of 100 TSS
    const points = foldTrainingLoad(constantSeries('2024-01-01', '2024-02-29', 100), opts)
    expect(points).toHaveLength(60)

    const last = points[59]
    expect(last?.ctl).toBeCloseTo(76.03, 1)
    expect(last?.atl).toBeCloseTo(99.98, 1)
    expect(last?.tsb).toBeCloseTo(-23.95, 1)
  })

  it('keeps tsb equal to ctl minus atl on every point', () => {
    const series = [40, 0, 120, 0, 0, 200, 60].map((tss, i) => ({ date: `2024-03-0${i + 1}`, tss }))
    for (const p of foldTrainingLoad(series, opts)) {
      expect(p.tsb).toBe(p.ctl - p.atl)
      expect(trainingLoadPointSchema.safeParse(p).success).toBe(true)
    }
  })

  it('starts from the given seed', () => {
    const [first] = foldTrainingLoad([{ date: '2024-01-01', tss: 0 }], { ...opts, initialCtl: 50, initialAtl: 70 })
    expect(first?.ctl).toBeCloseTo(50 * Math.exp(-1 / 42), 10)
    expect(first?.atl).toBeCloseTo(70 * Math.exp(-1 / 7), 10)
  })
})

describe('toDailySeries', () => {
  it('fills missing days with zero and sums duplicate days', () => {
    const series = toDailySeries([
      { date: '2024-01-01', tss: 50 },
      { date: '2024-01-01', tss: 25 },
      { date: '2024-01-04', tss: 80 },
    ])
    expect(series).toEqual([
      { date: '2024-01-01', tss: 75 },
      { date: '2024-01-02', tss: 0 },
      { date: '2024-01-03', tss: 0 },
      { date: '2024-01-04', tss: 80 },
    ])
  })

  it('extends the series up to an explicit end day', () => {
    const series = toDailySeries([{ date: '2024-01-01', tss: 10 }], undefined, '2024-01-03')
    expect(series.map((d) => d.tss)).toEqual([10, 0, 0])
  })

  it('maps missing training stress to zero', () => {
    const stress = stressFromMetrics([
      { date: '2024-01-01', trainingStress: 90, illnessSuspected: false },
      { date: '2024-01-02', trainingStress: null, illnessSuspected: false },
    ])
    expect(stress).toEqual([
      { date: '2024-01-01', tss: 90 },
      { date: '2024-01-02', tss: 0 },
    ])
  })
})

describe('training load summaries', () => {
  it('sums the seven days ending on the given day', () => {
    const series = constantSeries('2024-01-01', '2024-01-10', 10)
    expect(rollingStress(series, '2024-01-10')).toBe(70)
    expect(rollingStress(series, '2024-01-03')).toBe(30)
  })

  it('finds the last point on or before a day', () => {
    const points = foldTrainingLoad(constantSeries('2024-01-01', '2024-01-05', 10), opts)
    expect(pointAtOrBefore(points, '2024-01-03')?.date).toBe('2024-01-03')
    expect(pointAtOrBefore(points, '2024-02-01')?.date).toBe('2024-01-05')
    expect(pointAtOrBefore(points, '2023-12-31')).toBeNull()
  })

  it('has no workload ratio without fitness', () => {
    expect(acuteChronicRatio({ date: '2024-01-01', tss: 0, ctl: 0, atl: 10, tsb: -10 })).toBeNull()
    expect(acuteChronicRatio({ date: '2024-01-01', tss: 0, ctl: 50, atl: 75, tsb: -25 })).toBe(1.5)
  })

  it.each([
    [10, 'fresh'],
    [5, 'neutral'],
    [-10, 'neutral'],
    [-10.5, 'fatigued'],
    [-30, 'fatigued'],
    [-31, 'overreached'],
  ] as const)('classifies tsb %p as %s', (tsb, expected) => {
    expect(classifyForm(tsb, thresholds)).toBe(expected)
  })
})

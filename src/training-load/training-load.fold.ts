import { addDays, dayKeyRange } from '../common/day-key'
import { isFiniteNumber } from '../common/score.utils'
import type { DailyMetric, DailyStress } from '../types/daily-metric.types'
import type { FormState, FormThresholds, TrainingLoadOptions, TrainingLoadPoint } from './training-load.types'

export const decayFactor = (timeConstantDays: number): number => 1 - Math.exp(-1 / timeConstantDays)

export const stressFromMetrics = (history: readonly DailyMetric[]): DailyStress[] =>
  history.map((m) => ({ date: m.date, tss: isFiniteNumber(m.trainingStress) ? Math.max(0, m.trainingStress) : 0 }))

/**
 * Sums entries per day and fills every missing day between `from` and `to` with 0.
 * Defaults to the span of the entries themselves.
 */
export function toDailySeries(entries: readonly DailyStress[], from?: string, to?: string): DailyStress[] {
  if (entries.length === 0 && (from === undefined || to === undefined)) return []

  const byDate = new Map<string, number>()
  for (const e of entries) byDate.set(e.date, (byDate.get(e.date) ?? 0) + e.tss)

  const dates = [...byDate.keys()].sort()
  const start = from ?? dates[0]
  const end = to ?? dates[dates.length - 1]
  if (start === undefined || end === undefined) return []

  return dayKeyRange(start, end).map((date) => ({ date, tss: byDate.get(date) ?? 0 }))
}

/**
 * Exponentially weighted CTL/ATL recurrence over a gap-free daily series.
 * Each point depends only on the previous point and that day's stress.
 */
export function foldTrainingLoad(series: readonly DailyStress[], opts: TrainingLoadOptions): TrainingLoadPoint[] {
  const ctlK = decayFactor(opts.ctlDays)
  const atlK = decayFactor(opts.atlDays)
  const seed = { ctl: opts.initialCtl ?? 0, atl: opts.initialAtl ?? 0 }

  const points: TrainingLoadPoint[] = []
  for (const day of series) {
    const prev = points[points.length - 1] ?? seed
    const ctl = prev.ctl + (day.tss - prev.ctl) * ctlK
    const atl = prev.atl + (day.tss - prev.atl) * atlK
    points.push({ date: day.date, tss: day.tss, ctl, atl, tsb: ctl - atl })
  }
  return points
}

export const emptyPoint = (date: string): TrainingLoadPoint => ({ date, tss: 0, ctl: 0, atl: 0, tsb: 0 })

/** Last point on or before `date`. */
export function pointAtOrBefore(points: readonly TrainingLoadPoint[], date: string): TrainingLoadPoint | null {
  let found: TrainingLoadPoint | null = null
  for (const p of points) {
    if (p.date > date) break
    found = p
  }
  return found
}

/** Total stress of the `days` days ending on `date` (inclusive). */
export function rollingStress(series: readonly DailyStress[], date: string, days = 7): number {
  const start = addDays(date, -(days - 1))
  return series.filter((d) => d.date >= start && d.date <= date).reduce((sum, d) => sum + d.tss, 0)
}

export const acuteChronicRatio = (point: TrainingLoadPoint): number | null => (point.ctl > 0 ? point.atl / point.ctl : null)

export function classifyForm(tsb: number, t: FormThresholds): FormState {
  if (tsb > t.freshTsb) return 'fresh'
  if (tsb >= t.neutralTsbFloor) return 'neutral'
  if (tsb >= t.fatiguedTsbFloor) return 'fatigued'
  return 'overreached'
}

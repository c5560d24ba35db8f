import { Inject, Injectable, Logger } from '@nestjs/common'
import { READINESS_CONFIG } from '../config/readiness-config'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import { parseInput } from '../common/validation'
import { dailyHistorySchema, dailyStressSchema, dayKeySchema } from '../types/daily-metric.schema'
import type { DailyMetric, DailyStress } from '../types/daily-metric.types'
import {
  acuteChronicRatio,
  classifyForm,
  emptyPoint,
  foldTrainingLoad,
  pointAtOrBefore,
  rollingStress,
  stressFromMetrics,
  toDailySeries,
} from './training-load.fold'
import type { TrainingLoadPoint, TrainingLoadSummary } from './training-load.types'

type SeedOptions = { initialCtl?: number; initialAtl?: number }

@Injectable()
export class TrainingLoadService {
  private readonly logger = new Logger(TrainingLoadService.name)

  constructor(@Inject(READINESS_CONFIG) private readonly config: ReadinessConfig) {}

  /** Gap-filled CTL/ATL/TSB curve over the given stress entries. */
  curve(stress: readonly DailyStress[], seed: SeedOptions = {}): TrainingLoadPoint[] {
    const entries = parseInput(dailyStressSchema.array(), stress, 'daily stress')
    return foldTrainingLoad(toDailySeries(entries), { ...this.config.trainingLoad, ...seed })
  }

  /** Curve from the first metric day through `today`, using each day's trainingStress. */
  curveFromMetrics(history: readonly DailyMetric[], today: string, seed: SeedOptions = {}): TrainingLoadPoint[] {
    const days = parseInput(dailyHistorySchema, history, 'daily history')
    const day = parseInput(dayKeySchema, today, 'today')
    const series = toDailySeries(
      stressFromMetrics(days.filter((m) => m.date <= day)),
      undefined,
      day,
    )
    return foldTrainingLoad(series, { ...this.config.trainingLoad, ...seed })
  }

  summarize(points: readonly TrainingLoadPoint[], date: string): TrainingLoadSummary {
    const point = pointAtOrBefore(points, date) ?? emptyPoint(date)
    const weeklyTss = rollingStress(points, date)
    const form = classifyForm(point.tsb, this.config.trainingLoad)

    this.logger.debug(
      `Load on ${date}: ctl=${point.ctl.toFixed(1)} atl=${point.atl.toFixed(1)} tsb=${point.tsb.toFixed(1)} (${form})`,
    )
    return { date, point, weeklyTss, acuteChronicRatio: acuteChronicRatio(point), form }
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common'
import { READINESS_CONFIG } from '../config/readiness-config'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import { parseInput } from '../common/validation'
import { dailyHistorySchema, dayKeySchema } from '../types/daily-metric.schema'
import type { DailyMetric } from '../types/daily-metric.types'
import { sleepNightSchema } from './sleep.schema'
import type { SleepDebt, SleepNight, SleepResult } from './sleep.types'
import { computeSleepDebt, scoreSleep, usualSleepTimes } from './sleep.utils'

@Injectable()
export class SleepService {
  private readonly logger = new Logger(SleepService.name)

  constructor(@Inject(READINESS_CONFIG) private readonly config: ReadinessConfig) {}

  /**
   * Scores `night` against the sleep-duration baseline and the usual bed and
   * wake times of `previousNights`.
   */
  score(night: SleepNight, baselineHours: number | null, previousNights: readonly SleepNight[] = []): SleepResult {
    const tonight = parseInput(sleepNightSchema, night, 'sleep night')
    const previous = parseInput(sleepNightSchema.array(), previousNights, 'previous nights')

    const result = scoreSleep(tonight, baselineHours, usualSleepTimes(previous), this.config.sleep)

    const unavailable = result.subScores.filter((s) => !s.available).map((s) => s.name)
    if (unavailable.length > 0) {
      this.logger.debug(`Sleep ${tonight.date}: no data for ${unavailable.join(', ')}`)
    }
    return result
  }

  debt(history: readonly DailyMetric[], date: string, baselineHours: number | null = null): SleepDebt {
    const days = parseInput(dailyHistorySchema, history, 'daily history')
    const day = parseInput(dayKeySchema, date, 'date')
    const need = baselineHours !== null && baselineHours > 0 ? baselineHours : this.config.sleep.defaultNeedHours

    const result = computeSleepDebt(days, day, need, this.config.sleep.debtWindowDays)
    this.logger.debug(`Sleep debt ${day}: ${result.debtHours.toFixed(1)}h over ${result.nightsCounted} nights`)
    return result
  }
}

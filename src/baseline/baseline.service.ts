import { Inject, Injectable, Logger } from '@nestjs/common'
import { READINESS_CONFIG } from '../config/readiness-config'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import { parseInput } from '../common/validation'
import { dailyHistorySchema, dayKeySchema } from '../types/daily-metric.schema'
import type { DailyMetric } from '../types/daily-metric.types'
import type { BaselineSet } from './baseline.types'
import { computeBaselineSet } from './baseline.utils'

@Injectable()
export class BaselineService {
  private readonly logger = new Logger(BaselineService.name)

  constructor(@Inject(READINESS_CONFIG) private readonly config: ReadinessConfig) {}

  compute(history: readonly DailyMetric[], today: string): BaselineSet {
    const days = parseInput(dailyHistorySchema, history, 'daily history')
    const day = parseInput(dayKeySchema, today, 'today')

    const result = computeBaselineSet(days, day, this.config.baseline)

    const missing = Object.entries(result.baselines)
      .filter(([, b]) => b === null)
      .map(([field]) => field)
    if (missing.length > 0) {
      this.logger.warn(`Baselines unavailable for ${day}: ${missing.join(', ')}`)
    }
    return result
  }
}

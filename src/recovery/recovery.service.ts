import { Inject, Injectable, Logger } from '@nestjs/common'
import { trackedBaselinesSchema } from '../baseline/baseline.schema'
import { READINESS_CONFIG } from '../config/readiness-config'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import { parseInput } from '../common/validation'
import { trainingLoadPointSchema } from '../training-load/training-load.schema'
import { dailyMetricSchema, dayKeySchema } from '../types/daily-metric.schema'
import { RECOVERY_CONFOUNDERS } from './confounders/confounder.types'
import type { ConfounderDetector } from './confounders/confounder.types'
import { scoreRecovery } from './recovery.score'
import type { RecoveryInput, RecoveryResult } from './recovery.types'

@Injectable()
export class RecoveryService {
  private readonly logger = new Logger(RecoveryService.name)

  constructor(
    @Inject(READINESS_CONFIG) private readonly config: ReadinessConfig,
    @Inject(RECOVERY_CONFOUNDERS) private readonly detectors: ConfounderDetector[],
  ) {}

  score(input: RecoveryInput): RecoveryResult {
    const date = parseInput(dayKeySchema, input.date, 'recovery date')
    const metric = parseInput(dailyMetricSchema.nullable(), input.metric, 'daily metric')
    const baselines = parseInput(trackedBaselinesSchema, input.baselines, 'baselines')
    const previousLoad = parseInput(trainingLoadPointSchema.nullable(), input.previousLoad, 'previous training load')

    const result = scoreRecovery({ date, metric, baselines, previousLoad }, this.config, this.detectors)

    const unavailable = result.subScores.filter((s) => !s.available).map((s) => s.name)
    if (unavailable.length > 0) {
      this.logger.warn(`Recovery ${date}: no data for ${unavailable.join(', ')}, weights rebalanced`)
    }
    if (result.confounder.applied) {
      this.logger.warn(
        `Recovery ${date}: ${result.confounder.kind ?? 'confounder'} penalty ${result.confounder.penalty.toFixed(1)}`,
      )
    }
    this.logger.debug(`Recovery ${date}: ${result.score} (${result.band})`)
    return result
  }
}

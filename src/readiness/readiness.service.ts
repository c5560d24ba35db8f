import { Inject, Injectable, Logger } from '@nestjs/common'
import { READINESS_CONFIG } from '../config/readiness-config'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import { parseInput } from '../common/validation'
import { RECOVERY_CONFOUNDERS } from '../recovery/confounders/confounder.types'
import type { ConfounderDetector } from '../recovery/confounders/confounder.types'
import { dailyHistorySchema, dayKeySchema } from '../types/daily-metric.schema'
import type { DailyMetric } from '../types/daily-metric.types'
import { quickReadiness } from './readiness.recommendation'
import { quickInputSchemas, snapshotOptionsSchema } from './readiness.schema'
import { buildSnapshot } from './readiness.snapshot'
import type { ReadinessSnapshot, SnapshotOptions, TrainingRecommendation } from './readiness.types'

@Injectable()
export class ReadinessService {
  private readonly logger = new Logger(ReadinessService.name)

  constructor(
    @Inject(READINESS_CONFIG) private readonly config: ReadinessConfig,
    @Inject(RECOVERY_CONFOUNDERS) private readonly detectors: ConfounderDetector[],
  ) {}

  /** Daily readiness for `today`; history after `today` is ignored. */
  snapshot(history: readonly DailyMetric[], today: string, options: SnapshotOptions = {}): ReadinessSnapshot {
    const days = parseInput(dailyHistorySchema, history, 'daily history')
    const day = parseInput(dayKeySchema, today, 'today')
    const opts = parseInput(snapshotOptionsSchema, options, 'snapshot options')

    const snapshot = buildSnapshot(days, day, opts, this.config, this.detectors)

    if (snapshot.recovery.confounder.applied) {
      this.logger.warn(
        `Readiness ${day}: ${snapshot.recovery.confounder.kind ?? 'confounder'} detected, recovery ${snapshot.recovery.baseScore} -> ${snapshot.recovery.score}`,
      )
    }
    if (snapshot.risk.level === 'High' || snapshot.risk.level === 'Critical') {
      this.logger.warn(`Readiness ${day}: overtraining risk ${snapshot.risk.level} (${snapshot.risk.score})`)
    }
    this.logger.log(
      `Readiness ${day}: recovery ${snapshot.recovery.score}, form ${snapshot.trainingLoad.form}, risk ${snapshot.risk.level}, ${snapshot.recommendation.recommendation} (${snapshot.recommendation.confidence}%)`,
    )
    return snapshot
  }

  /** Recommendation from a recovery score alone, for when no history is at hand. */
  quickRecommendation(recoveryScore: number, yesterdayTss: number | null = null): TrainingRecommendation {
    const score = parseInput(quickInputSchemas.recoveryScore, recoveryScore, 'recovery score')
    const tss = parseInput(quickInputSchemas.yesterdayTss, yesterdayTss, "yesterday's TSS")
    return quickReadiness(score, tss, this.config.recommendation)
  }
}

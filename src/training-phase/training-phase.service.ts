import { Inject, Injectable, Logger } from '@nestjs/common'
import { z } from 'zod'
import { READINESS_CONFIG } from '../config/readiness-config'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import { parseInput } from '../common/validation'
import { intensityBucketsSchema } from '../types/daily-metric.schema'
import type { IntensityBuckets, IntensityDistribution } from '../types/zones.types'
import { intensityDistribution } from '../types/zones.utils'
import { detectPhase } from './training-phase.rules'
import { intensityDistributionSchema } from './training-phase.schema'
import type { PhaseResult } from './training-phase.types'

const weeklyTssSchema = z.number().finite().nonnegative()

@Injectable()
export class TrainingPhaseService {
  private readonly logger = new Logger(TrainingPhaseService.name)

  constructor(@Inject(READINESS_CONFIG) private readonly config: ReadinessConfig) {}

  /** Phase from a week's stress and its time in zones 1-5. */
  fromBuckets(weeklyTss: number, buckets: IntensityBuckets): PhaseResult {
    const zones = parseInput(intensityBucketsSchema, buckets, 'intensity buckets')
    return this.detect(weeklyTss, intensityDistribution(zones))
  }

  detect(weeklyTss: number, distribution: IntensityDistribution): PhaseResult {
    const tss = parseInput(weeklyTssSchema, weeklyTss, 'weekly TSS')
    const dist = parseInput(intensityDistributionSchema, distribution, 'intensity distribution')

    const result = detectPhase(tss, dist, this.config.phase)
    this.logger.debug(
      `Phase ${result.phase} (${result.confidence.toFixed(2)}) at ${tss.toFixed(0)} TSS, ` +
        `low ${dist.lowIntensityPercent.toFixed(0)}% high ${dist.highIntensityPercent.toFixed(0)}%`,
    )
    return result
  }
}

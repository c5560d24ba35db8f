import { Inject, Injectable, Logger } from '@nestjs/common'
import { READINESS_CONFIG } from '../config/readiness-config'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import { parseInput } from '../common/validation'
import { datedValueSchema } from './correlation.schema'
import type { CorrelationOutcome, DatedValue } from './correlation.types'
import { describeCorrelation, pairByDate, pearson } from './correlation.utils'

export type CorrelationInsight = {
  readonly outcome: CorrelationOutcome
  readonly insight: string
}

@Injectable()
export class CorrelationService {
  private readonly logger = new Logger(CorrelationService.name)

  constructor(@Inject(READINESS_CONFIG) private readonly config: ReadinessConfig) {}

  correlate(x: readonly number[], y: readonly number[]): CorrelationOutcome {
    const outcome = pearson(x, y, this.config.correlation)
    if (!outcome.available) {
      this.logger.debug(`Correlation unavailable: ${outcome.reason} (n=${outcome.sampleSize})`)
    }
    return outcome
  }

  /** Joins two dated series on date, then correlates and describes them. */
  correlateByDate(
    xs: readonly DatedValue[],
    ys: readonly DatedValue[],
    labels: { x: string; y: string },
  ): CorrelationInsight {
    const left = parseInput(datedValueSchema.array(), xs, `${labels.x} series`)
    const right = parseInput(datedValueSchema.array(), ys, `${labels.y} series`)

    const paired = pairByDate(left, right)
    const outcome = this.correlate(paired.x, paired.y)
    return { outcome, insight: describeCorrelation(outcome, labels.x, labels.y) }
  }
}

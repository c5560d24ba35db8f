import { Inject, Injectable, Logger } from '@nestjs/common'
import { READINESS_CONFIG } from '../config/readiness-config'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import { parseInput } from '../common/validation'
import { assessOvertrainingRisk } from './overtraining-risk.rules'
import { riskInputSchema } from './overtraining-risk.schema'
import type { RiskInput, RiskResult } from './overtraining-risk.types'

@Injectable()
export class OvertrainingRiskService {
  private readonly logger = new Logger(OvertrainingRiskService.name)

  constructor(@Inject(READINESS_CONFIG) private readonly config: ReadinessConfig) {}

  assess(input: RiskInput): RiskResult {
    const parsed = parseInput(riskInputSchema, input, 'risk input')
    const result = assessOvertrainingRisk(parsed, this.config.risk)

    if (result.level === 'High' || result.level === 'Critical') {
      this.logger.warn(`Overtraining risk ${result.level} (${result.score.toFixed(0)}): ${result.factors[0]?.name ?? '-'}`)
    } else {
      this.logger.debug(`Overtraining risk ${result.level} (${result.score.toFixed(0)})`)
    }
    return result
  }
}

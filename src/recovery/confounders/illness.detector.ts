import type { ReadinessConfig } from '../../config/readiness-config.schema'
import type { ConfounderFinding } from '../recovery.types'
import { notDetected } from './confounder.types'
import type { ConfounderContext, ConfounderDetector } from './confounder.types'

type IllnessConfig = ReadinessConfig['confounders']['illness']

/**
 * Flags illness from the user's own report or from elevated breathing together
 * with suppressed HRV and raised RHR. Never penalises; its finding stops other
 * detectors from attributing the same deviation.
 */
export class IllnessDetector implements ConfounderDetector {
  readonly kind = 'illness' as const

  constructor(private readonly cfg: IllnessConfig) {}

  detect(ctx: ConfounderContext): ConfounderFinding {
    if (ctx.metric.illnessSuspected) {
      return { kind: this.kind, detected: true, confidence: 100, penalty: 0, signals: ['illness reported'] }
    }

    const { hrv, rhr, respiratory } = ctx.changes
    const signals: string[] = []
    if (respiratory !== null && respiratory * 100 >= this.cfg.respiratoryRisePct) {
      signals.push(`respiratory rate +${(respiratory * 100).toFixed(1)}%`)
    }
    if (hrv !== null && -hrv * 100 >= this.cfg.hrvDropPct) {
      signals.push(`hrv ${(hrv * 100).toFixed(1)}%`)
    }
    if (rhr !== null && rhr * 100 >= this.cfg.rhrRisePct) {
      signals.push(`rhr +${(rhr * 100).toFixed(1)}%`)
    }

    if (signals.length < 3) return notDetected(this.kind, signals)
    return { kind: this.kind, detected: true, confidence: 100, penalty: 0, signals }
  }
}

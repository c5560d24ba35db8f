import { clamp, isFiniteNumber } from '../../common/score.utils'
import { isWeekend } from '../../common/day-key'
import { findSubScore } from '../../common/weight-rebalance'
import type { ReadinessConfig } from '../../config/readiness-config.schema'
import type { ConfounderFinding } from '../recovery.types'
import { notDetected } from './confounder.types'
import type { ConfounderContext, ConfounderDetector } from './confounder.types'

type AlcoholConfig = ReadinessConfig['confounders']['alcohol']

/**
 * Multi-signal alcohol attribution. HRV suppression is required; sleep quality,
 * RHR, stable breathing and a weekend date add confidence. The penalty scales
 * with confidence and is capped at `maxPenalty`.
 */
export class AlcoholDetector implements ConfounderDetector {
  readonly kind = 'alcohol' as const

  constructor(private readonly cfg: AlcoholConfig) {}

  detect(ctx: ConfounderContext, prior: readonly ConfounderFinding[]): ConfounderFinding {
    if (prior.some((f) => f.kind === 'illness' && f.detected)) {
      return notDetected(this.kind, ['skipped: illness'])
    }

    const { metric, changes } = ctx
    const sleepScore = isFiniteNumber(metric.sleepScore) ? metric.sleepScore : null
    if (sleepScore === null && !isFiniteNumber(metric.sleepHours)) {
      return notDetected(this.kind, ['skipped: no sleep data'])
    }
    if (changes.hrv === null) return notDetected(this.kind)

    const hrvChangePct = changes.hrv * 100
    const tier = this.cfg.hrvTiers.find((t) => hrvChangePct < t.below)
    if (!tier) return notDetected(this.kind)

    const signals = [`hrv ${hrvChangePct.toFixed(1)}%`]
    let confidence = tier.confidence

    if (sleepScore !== null) {
      const s = this.cfg.poorSleep
      if (sleepScore < s.veryPoorBelow) confidence += s.veryPoorConfidence
      else if (sleepScore < s.poorBelow) confidence += s.poorConfidence
      if (sleepScore < s.deepSuppressionBelow) confidence += s.deepSuppressionConfidence
      if (sleepScore < s.poorBelow) signals.push(`sleep score ${sleepScore}`)
    }

    const rhrScore = findSubScore(ctx.subScores, 'rhr')
    const rhrSignal = rhrScore?.available ? rhrScore.score : null
    const r = this.cfg.rhr
    let multiplier = 1
    if (rhrSignal !== null && rhrSignal < r.strongBelow) {
      confidence += r.strongConfidence
      multiplier = r.strongMultiplier
      signals.push('rhr strongly elevated')
    } else if (rhrSignal !== null && rhrSignal < r.moderateBelow) {
      confidence += r.moderateConfidence
      multiplier = r.moderateMultiplier
      signals.push('rhr elevated')
    }

    if (changes.respiratory !== null) {
      const rr = this.cfg.respiratory
      if (Math.abs(changes.respiratory) < rr.stableWithin) {
        confidence += rr.stableConfidence
        signals.push('respiratory rate stable')
      } else if (changes.respiratory > rr.elevatedAbove) {
        confidence += rr.elevatedConfidence
      }
    }

    const weekend = isWeekend(metric.date)
    if (weekend) {
      confidence += this.cfg.weekend.confidence
      signals.push('weekend')
    }

    confidence = clamp(confidence, 0, 100)
    if (confidence < this.cfg.confidenceThreshold) return { ...notDetected(this.kind, signals), confidence }

    let penalty = tier.basePenalty * (confidence / 100) * multiplier
    if (weekend && confidence > this.cfg.weekend.amplifyAboveConfidence) penalty *= this.cfg.weekend.multiplier
    if (sleepScore !== null && sleepScore >= this.cfg.excellentSleepScore) penalty *= this.cfg.excellentSleepMitigation
    else if (sleepScore !== null && sleepScore >= this.cfg.goodSleepScore) penalty *= this.cfg.goodSleepMitigation

    return {
      kind: this.kind,
      detected: true,
      confidence,
      penalty: Math.min(penalty, this.cfg.maxPenalty),
      signals,
    }
  }
}

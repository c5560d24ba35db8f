import { clampScore, relativeChange } from '../common/score.utils'
import { combineSubScores, rebalanceWeights } from '../common/weight-rebalance'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import type { ConfounderDetector } from './confounders/confounder.types'
import {
  formComponent,
  hrvComponent,
  recoveryBandFor,
  respiratoryComponent,
  rhrComponent,
  sleepComponent,
} from './recovery-components'
import type {
  BaselineChanges,
  ConfounderFinding,
  ConfounderRecord,
  RecoveryComponent,
  RecoveryInput,
  RecoveryResult,
} from './recovery.types'

const NO_CONFOUNDER: ConfounderRecord = { applied: false, kind: null, penalty: 0, findings: [] }

export function baselineChanges(input: RecoveryInput): BaselineChanges {
  const { metric, baselines } = input
  return {
    hrv: relativeChange(metric?.hrvMs, baselines.hrvMs?.mean),
    rhr: relativeChange(metric?.rhrBpm, baselines.rhrBpm?.mean),
    respiratory: relativeChange(metric?.respiratoryRate, baselines.respiratoryRate?.mean),
  }
}

export function summarizeFindings(findings: readonly ConfounderFinding[]): ConfounderRecord {
  const detected = findings.filter((f) => f.detected)
  const penalty = detected.reduce((sum, f) => sum + f.penalty, 0)
  const primary = detected.find((f) => f.penalty > 0) ?? detected[0]
  return { applied: penalty > 0, kind: primary?.kind ?? null, penalty, findings }
}

/**
 * Composite recovery for one day. Missing components score neutral and lose
 * their weight to the others; confounder penalties come off the combined score.
 */
export function scoreRecovery(
  input: RecoveryInput,
  config: ReadinessConfig,
  detectors: readonly ConfounderDetector[],
): RecoveryResult {
  const cfg = config.recovery
  const { metric } = input
  const changes = baselineChanges(input)

  const readings: [RecoveryComponent, number | null][] = [
    ['hrv', hrvComponent(changes.hrv, cfg)],
    ['rhr', rhrComponent(changes.rhr, cfg)],
    ['sleep', sleepComponent(metric?.sleepScore, metric?.sleepHours, input.baselines.sleepHours?.mean ?? null)],
    ['respiratory', respiratoryComponent(changes.respiratory, cfg)],
    ['form', formComponent(input.previousLoad, cfg)],
  ]
  const subScores = rebalanceWeights(
    readings.map(([name, score]) => ({
      name,
      score: score ?? cfg.neutralScore,
      available: score !== null,
      defaultWeight: cfg.weights[name],
    })),
  )
  const base = clampScore(combineSubScores(subScores, cfg.neutralScore))

  let confounder = NO_CONFOUNDER
  if (metric) {
    const findings: ConfounderFinding[] = []
    for (const detector of detectors) {
      findings.push(detector.detect({ metric, changes, subScores }, findings))
    }
    confounder = summarizeFindings(findings)
  }

  const score = Math.round(clampScore(base - confounder.penalty))
  return {
    date: input.date,
    score,
    band: recoveryBandFor(score, cfg.bands),
    baseScore: Math.round(base),
    subScores,
    changes,
    confounder,
  }
}

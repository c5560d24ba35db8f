import { computeBaselineSet, findMetric } from '../baseline/baseline.utils'
import { addDays, dayKeyRange } from '../common/day-key'
import { mean } from '../common/score.utils'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import { assessOvertrainingRisk } from '../overtraining-risk/overtraining-risk.rules'
import type { RiskInput } from '../overtraining-risk/overtraining-risk.types'
import type { ConfounderDetector } from '../recovery/confounders/confounder.types'
import { scoreRecovery } from '../recovery/recovery.score'
import type { RecoveryResult } from '../recovery/recovery.types'
import { computeSleepDebt, scoreSleep, usualSleepTimes } from '../sleep/sleep.utils'
import {
  acuteChronicRatio,
  classifyForm,
  emptyPoint,
  foldTrainingLoad,
  pointAtOrBefore,
  rollingStress,
  stressFromMetrics,
  toDailySeries,
} from '../training-load/training-load.fold'
import type { TrainingLoadPoint, TrainingLoadSummary } from '../training-load/training-load.types'
import { detectPhase } from '../training-phase/training-phase.rules'
import type { DailyMetric } from '../types/daily-metric.types'
import { intensityDistribution } from '../types/zones.utils'
import { recommendTraining } from './readiness.recommendation'
import type { ReadinessSnapshot, SnapshotOptions } from './readiness.types'

const toPercent = (fraction: number | null): number | null => (fraction === null ? null : fraction * 100)

function summarizeLoad(points: readonly TrainingLoadPoint[], date: string, config: ReadinessConfig): TrainingLoadSummary {
  const point = pointAtOrBefore(points, date) ?? emptyPoint(date)
  return {
    date,
    point,
    weeklyTss: rollingStress(points, date),
    acuteChronicRatio: acuteChronicRatio(point),
    form: classifyForm(point.tsb, config.trainingLoad),
  }
}

function recoveryOn(
  history: readonly DailyMetric[],
  points: readonly TrainingLoadPoint[],
  date: string,
  config: ReadinessConfig,
  detectors: readonly ConfounderDetector[],
): RecoveryResult {
  return scoreRecovery(
    {
      date,
      metric: findMetric(history, date) ?? null,
      baselines: computeBaselineSet(history, date, config.baseline).baselines,
      previousLoad: pointAtOrBefore(points, addDays(date, -1)),
    },
    config,
    detectors,
  )
}

/**
 * Everything known about `today` from the history up to and including it.
 * Later days in `history` are ignored.
 */
export function buildSnapshot(
  history: readonly DailyMetric[],
  today: string,
  options: SnapshotOptions,
  config: ReadinessConfig,
  detectors: readonly ConfounderDetector[],
): ReadinessSnapshot {
  const known = history.filter((m) => m.date <= today)
  const baselines = computeBaselineSet(known, today, config.baseline)

  const points = foldTrainingLoad(toDailySeries(stressFromMetrics(known), undefined, today), {
    ...config.trainingLoad,
    initialCtl: options.initialCtl,
    initialAtl: options.initialAtl,
  })
  const trainingLoad = summarizeLoad(points, today, config)

  const recovery = recoveryOn(known, points, today, config, detectors)

  // only days with a record count towards the average
  const recentScores = dayKeyRange(addDays(today, -(config.risk.recoveryAverageDays - 1)), today)
    .filter((day) => findMetric(known, day) !== undefined)
    .map((day) => (day === today ? recovery : recoveryOn(known, points, day, config, detectors)).score)
  const recoveryAverage = mean(recentScores)

  const sleepBaseline = baselines.baselines.sleepHours?.mean ?? null
  const sleep = options.sleepNight
    ? scoreSleep(options.sleepNight, sleepBaseline, usualSleepTimes(options.previousNights ?? []), config.sleep)
    : null
  const sleepDebt = computeSleepDebt(
    known,
    today,
    sleepBaseline !== null && sleepBaseline > 0 ? sleepBaseline : config.sleep.defaultNeedHours,
    config.sleep.debtWindowDays,
  )

  const tsb = points.length > 0 ? trainingLoad.point.tsb : null
  const riskInput: RiskInput = {
    recoveryAverage,
    hrvChangePct: toPercent(recovery.changes.hrv),
    rhrChangePct: toPercent(recovery.changes.rhr),
    tsb,
    sleepDebtHours: sleepDebt.nightsCounted > 0 ? sleepDebt.debtHours : null,
  }
  const risk = assessOvertrainingRisk(riskInput, config.risk)

  const phase = options.intensity
    ? detectPhase(trainingLoad.weeklyTss, intensityDistribution(options.intensity), config.phase)
    : null

  const recommendation = recommendTraining(
    {
      rollingHrv: baselines.baselines.hrvMs?.mean ?? null,
      hrvBaseline: baselines.hrvTrend?.longTermMedian ?? null,
      hrvCv: baselines.hrvVariability?.coefficientOfVariation ?? null,
      recoveryScore: recovery.score,
      tsb,
    },
    config.recommendation,
  )

  return { date: today, baselines, trainingLoad, recovery, recoveryAverage, sleep, sleepDebt, risk, phase, recommendation }
}

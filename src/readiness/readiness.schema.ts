import { z } from 'zod'
import { baselineSetSchema } from '../baseline/baseline.schema'
import { riskResultSchema } from '../overtraining-risk/overtraining-risk.schema'
import { recoveryResultSchema } from '../recovery/recovery.schema'
import { sleepDebtSchema, sleepNightSchema, sleepResultSchema } from '../sleep/sleep.schema'
import { trainingLoadSummarySchema } from '../training-load/training-load.schema'
import { phaseResultSchema } from '../training-phase/training-phase.schema'
import { intensityBucketsSchema } from '../types/daily-metric.schema'

export const snapshotOptionsSchema = z.object({
  sleepNight: sleepNightSchema.nullable().optional(),
  previousNights: z.array(sleepNightSchema).optional(),
  intensity: intensityBucketsSchema.nullable().optional(),
  initialCtl: z.number().finite().nonnegative().optional(),
  initialAtl: z.number().finite().nonnegative().optional(),
})

export const quickInputSchemas = {
  recoveryScore: z.number().finite().min(0).max(100),
  yesterdayTss: z.number().finite().nonnegative().nullable(),
}

export const trainingRecommendationSchema = z.enum(['Train Hard', 'Train Moderate', 'Train Easy', 'Rest'])

const signalSchema = z.number().int().min(-100).max(100)

export const recommendationResultSchema = z.object({
  recommendation: trainingRecommendationSchema,
  confidence: z.number().int().min(0).max(100),
  signals: z.object({
    hrvTrend: signalSchema,
    hrvStability: signalSchema,
    recovery: z.number().min(0).max(100),
    form: signalSchema,
  }),
  reasoning: z.array(z.string()),
  description: z.string(),
  suggestedTss: z.object({ min: z.number().nonnegative(), max: z.number().nonnegative() }),
  suggestedIntensityFactor: z.number().positive(),
})

export const readinessSnapshotSchema = z.object({
  date: z.string(),
  baselines: baselineSetSchema,
  trainingLoad: trainingLoadSummarySchema,
  recovery: recoveryResultSchema,
  recoveryAverage: z.number().min(0).max(100).nullable(),
  sleep: sleepResultSchema.nullable(),
  sleepDebt: sleepDebtSchema,
  risk: riskResultSchema,
  phase: phaseResultSchema.nullable(),
  recommendation: recommendationResultSchema,
})

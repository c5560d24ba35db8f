import { z } from 'zod'

const baselineSchema = z
  .object({
    mean: z.number().finite(),
    sampleCount: z.number().int().nonnegative(),
    windowDays: z.number().int().positive(),
  })
  .nullable()

export const trackedBaselinesSchema = z.object({
  hrvMs: baselineSchema,
  rhrBpm: baselineSchema,
  sleepHours: baselineSchema,
  sleepScore: baselineSchema,
  respiratoryRate: baselineSchema,
})

export const baselineSetSchema = z.object({
  today: z.string(),
  windowStart: z.string(),
  windowEnd: z.string(),
  baselines: trackedBaselinesSchema,
  hrvVariability: z
    .object({
      coefficientOfVariation: z.number().finite().nonnegative(),
      stability: z.enum(['excellent', 'good', 'moderate', 'poor']),
    })
    .nullable(),
  hrvTrend: z
    .object({
      direction: z.enum(['improving', 'stable', 'declining']),
      changePercent: z.number().finite(),
      shortTermMean: z.number().finite(),
      longTermMedian: z.number().finite(),
    })
    .nullable(),
})

import { z } from 'zod'
import { dayKeySchema } from '../types/daily-metric.schema'

export const datedValueSchema = z.object({
  date: dayKeySchema,
  value: z.number(),
})

export const correlationOutcomeSchema = z.discriminatedUnion('available', [
  z.object({
    available: z.literal(true),
    coefficient: z.number().min(-1).max(1),
    rSquared: z.number().min(0).max(1),
    sampleSize: z.number().int().min(3),
    significance: z.enum(['strong', 'moderate', 'weak', 'none']),
    trend: z.enum(['positive', 'negative', 'none']),
  }),
  z.object({
    available: z.literal(false),
    reason: z.enum(['insufficient-samples', 'zero-variance']),
    sampleSize: z.number().int().nonnegative(),
  }),
])

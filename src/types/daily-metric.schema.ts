import { z } from 'zod'
import { isDayKey } from '../common/day-key'
import type { DailyMetric, DailyStress } from './daily-metric.types'
import type { IntensityBuckets } from './zones.types'

export const dayKeySchema = z.string().refine(isDayKey, { message: 'expected a YYYY-MM-DD calendar day' })

const optionalMeasurement = z.number().finite().nonnegative().nullable().optional()

export const dailyMetricSchema = z.object({
  date: dayKeySchema,
  hrvMs: optionalMeasurement,
  rhrBpm: optionalMeasurement,
  sleepHours: z.number().finite().min(0).max(24).nullable().optional(),
  sleepScore: z.number().finite().min(0).max(100).nullable().optional(),
  respiratoryRate: optionalMeasurement,
  trainingStress: optionalMeasurement,
  illnessSuspected: z.boolean(),
}) satisfies z.ZodType<DailyMetric>

/** Ascending by date, one record per day. */
export const dailyHistorySchema = z.array(dailyMetricSchema).superRefine((days, ctx) => {
  for (let i = 1; i < days.length; i++) {
    const prev = days[i - 1]
    const cur = days[i]
    if (prev && cur && cur.date <= prev.date) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, 'date'],
        message: `dates must be strictly ascending (${prev.date} then ${cur.date})`,
      })
    }
  }
})

export const dailyStressSchema = z.object({
  date: dayKeySchema,
  tss: z.number().finite().nonnegative(),
}) satisfies z.ZodType<DailyStress>

export const intensityBucketsSchema = z.object({
  z1Sec: z.number().finite().nonnegative(),
  z2Sec: z.number().finite().nonnegative(),
  z3Sec: z.number().finite().nonnegative(),
  z4Sec: z.number().finite().nonnegative(),
  z5Sec: z.number().finite().nonnegative(),
}) satisfies z.ZodType<IntensityBuckets>

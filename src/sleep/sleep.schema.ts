import { z } from 'zod'
import { dayKeySchema } from '../types/daily-metric.schema'
import { subScoreSchema } from '../recovery/recovery.schema'
import type { SleepNight } from './sleep.types'

const hours = z.number().finite().min(0).max(24).nullable().optional()
const minuteOfDay = z.number().finite().min(0).lt(1440).nullable().optional()

export const sleepNightSchema = z.object({
  date: dayKeySchema,
  asleepHours: hours,
  inBedHours: hours,
  deepHours: hours,
  remHours: hours,
  wakeEvents: z.number().int().nonnegative().nullable().optional(),
  bedtimeMin: minuteOfDay,
  wakeTimeMin: minuteOfDay,
}) satisfies z.ZodType<SleepNight>

export const sleepResultSchema = z.object({
  date: z.string(),
  score: z.number().int().min(0).max(100),
  band: z.enum(['Optimal', 'Good', 'Fair', 'Pay Attention']),
  needHours: z.number().positive(),
  subScores: z.array(subScoreSchema(['performance', 'efficiency', 'stageQuality', 'restfulness', 'timing'])).length(5),
})

export const sleepDebtSchema = z.object({
  date: z.string(),
  windowDays: z.number().int().positive(),
  needHours: z.number().positive(),
  nightsCounted: z.number().int().nonnegative(),
  debtHours: z.number().finite().nonnegative(),
})

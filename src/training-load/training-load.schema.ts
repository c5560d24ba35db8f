import { z } from 'zod'

export const trainingLoadPointSchema = z.object({
  date: z.string(),
  tss: z.number().finite().nonnegative(),
  ctl: z.number().finite().nonnegative(),
  atl: z.number().finite().nonnegative(),
  tsb: z.number().finite(),
})

export const trainingLoadSummarySchema = z.object({
  date: z.string(),
  point: trainingLoadPointSchema,
  weeklyTss: z.number().finite().nonnegative(),
  acuteChronicRatio: z.number().finite().nonnegative().nullable(),
  form: z.enum(['fresh', 'neutral', 'fatigued', 'overreached']),
})

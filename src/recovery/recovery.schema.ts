import { z } from 'zod'

const score = z.number().finite().min(0).max(100)

export const subScoreSchema = (names: [string, ...string[]]) =>
  z.object({
    name: z.enum(names),
    score,
    available: z.boolean(),
    defaultWeight: z.number().min(0).max(1),
    weight: z.number().min(0).max(1),
  })

export const confounderFindingSchema = z.object({
  kind: z.enum(['illness', 'alcohol']),
  detected: z.boolean(),
  confidence: z.number().min(0).max(100),
  penalty: z.number().nonnegative(),
  signals: z.array(z.string()),
})

export const recoveryResultSchema = z.object({
  date: z.string(),
  score: score.int(),
  band: z.enum(['Optimal', 'Good', 'Fair', 'Pay Attention']),
  baseScore: score,
  subScores: z.array(subScoreSchema(['hrv', 'rhr', 'sleep', 'respiratory', 'form'])).length(5),
  changes: z.object({
    hrv: z.number().finite().nullable(),
    rhr: z.number().finite().nullable(),
    respiratory: z.number().finite().nullable(),
  }),
  confounder: z.object({
    applied: z.boolean(),
    kind: z.enum(['illness', 'alcohol']).nullable(),
    penalty: z.number().nonnegative(),
    findings: z.array(confounderFindingSchema),
  }),
})

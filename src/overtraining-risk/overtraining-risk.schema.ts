import { z } from 'zod'

export const riskInputSchema = z.object({
  recoveryAverage: z.number().finite().min(0).max(100).nullable(),
  hrvChangePct: z.number().finite().nullable(),
  rhrChangePct: z.number().finite().nullable(),
  tsb: z.number().finite().nullable(),
  sleepDebtHours: z.number().finite().nonnegative().nullable(),
})

export const riskResultSchema = z.object({
  score: z.number().min(0).max(100),
  level: z.enum(['Low', 'Moderate', 'High', 'Critical']),
  factors: z.array(
    z.object({
      name: z.enum(['recovery', 'hrvDeviation', 'rhrElevation', 'tsb', 'sleepDebt']),
      value: z.number().finite(),
      severity: z.number().min(0).max(1),
      weight: z.number().min(0).max(1),
      description: z.string().min(1),
    }),
  ),
  recommendation: z.string().min(1),
})

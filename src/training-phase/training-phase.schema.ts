import { z } from 'zod'

export const phaseResultSchema = z.object({
  phase: z.enum(['Base', 'Build', 'Peak', 'Recovery', 'Transition']),
  confidence: z.number().min(0).max(1),
  weeklyTss: z.number().finite().nonnegative(),
  lowIntensityPercent: z.number().min(0).max(100),
  highIntensityPercent: z.number().min(0).max(100),
  recommendation: z.string().min(1),
})

export const intensityDistributionSchema = z
  .object({
    lowIntensityPercent: z.number().finite().min(0).max(100),
    highIntensityPercent: z.number().finite().min(0).max(100),
    totalSec: z.number().finite().nonnegative(),
  })
  .refine((d) => d.lowIntensityPercent + d.highIntensityPercent <= 100 + 1e-9, {
    message: 'low and high intensity shares exceed 100%',
  })

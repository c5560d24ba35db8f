import { z } from 'zod'
import { intensityBucketsSchema } from '../types/daily-metric.schema'
import type { ActivitySample, AthleteProfile } from './strain.types'

export const activitySampleSchema = z.object({
  offsetSec: z.number().finite().nonnegative(),
  heartRate: z.number().finite().positive().nullable().optional(),
  power: z.number().finite().nonnegative().nullable().optional(),
}) satisfies z.ZodType<ActivitySample>

/** Ascending offsets; equal offsets are tolerated as zero-length samples. */
export const activitySamplesSchema = z.array(activitySampleSchema).superRefine((samples, ctx) => {
  for (let i = 1; i < samples.length; i++) {
    const prev = samples[i - 1]
    const cur = samples[i]
    if (prev && cur && cur.offsetSec < prev.offsetSec) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, 'offsetSec'],
        message: `offsets must be ascending (${prev.offsetSec} then ${cur.offsetSec})`,
      })
    }
  }
})

export const athleteProfileSchema = z.object({
  restingHr: z.number().finite().positive(),
  maxHr: z.number().finite().positive(),
  ftp: z.number().finite().positive().nullable().optional(),
  sex: z.enum(['female', 'male', 'unspecified']),
}) satisfies z.ZodType<AthleteProfile>

const strainBand = z.enum(['Light', 'Moderate', 'Hard', 'Very Hard', 'All Out'])

export const strainResultSchema = z.object({
  trimp: z.number().finite().nonnegative(),
  epoc: z.number().finite().nonnegative(),
  strain: z.number().min(0).max(21),
  band: strainBand,
  source: z.enum(['heartRate', 'power', 'blended']).nullable(),
  durationMin: z.number().finite().nonnegative(),
  zoneSeconds: intensityBucketsSchema,
})

export const dailyStrainSchema = z.object({
  date: z.string(),
  activityCount: z.number().int().nonnegative(),
  epoc: z.number().finite().nonnegative(),
  baseStrain: z.number().min(0).max(21),
  recoveryFactor: z.number().positive(),
  strain: z.number().min(0).max(21),
  band: strainBand,
})

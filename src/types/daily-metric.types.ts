/**
 * One calendar day of physiological and training data.
 * Every numeric field is independently optional.
 */
export type DailyMetric = {
  readonly date: string // YYYY-MM-DD
  readonly hrvMs?: number | null
  readonly rhrBpm?: number | null
  readonly sleepHours?: number | null
  readonly sleepScore?: number | null // 0-100, precomputed
  readonly respiratoryRate?: number | null // breaths/min
  readonly trainingStress?: number | null // TSS for the day
  readonly illnessSuspected: boolean
}

export type TrackedMetric = 'hrvMs' | 'rhrBpm' | 'sleepHours' | 'sleepScore' | 'respiratoryRate'

export const TRACKED_METRICS: readonly TrackedMetric[] = [
  'hrvMs',
  'rhrBpm',
  'sleepHours',
  'sleepScore',
  'respiratoryRate',
]

export type DailyStress = {
  readonly date: string
  readonly tss: number
}

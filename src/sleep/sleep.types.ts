import type { SubScore } from '../common/weight-rebalance'

/** One night of sleep detail, keyed by the day it ends on. */
export type SleepNight = {
  readonly date: string
  readonly asleepHours?: number | null
  readonly inBedHours?: number | null
  readonly deepHours?: number | null
  readonly remHours?: number | null
  readonly wakeEvents?: number | null
  readonly bedtimeMin?: number | null // minutes after local midnight
  readonly wakeTimeMin?: number | null
}

export type SleepComponent = 'performance' | 'efficiency' | 'stageQuality' | 'restfulness' | 'timing'

export type SleepBand = 'Optimal' | 'Good' | 'Fair' | 'Pay Attention'

export type UsualSleepTimes = {
  readonly bedtimeMin: number | null
  readonly wakeTimeMin: number | null
}

export type SleepResult = {
  readonly date: string
  readonly score: number
  readonly band: SleepBand
  readonly needHours: number
  readonly subScores: readonly SubScore<SleepComponent>[]
}

export type SleepDebt = {
  readonly date: string
  readonly windowDays: number
  readonly needHours: number
  readonly nightsCounted: number
  readonly debtHours: number
}

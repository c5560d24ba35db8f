export type TrainingLoadPoint = {
  readonly date: string
  readonly tss: number
  readonly ctl: number // fitness
  readonly atl: number // fatigue
  readonly tsb: number // form = ctl - atl
}

export type FormState = 'fresh' | 'neutral' | 'fatigued' | 'overreached'

export type TrainingLoadSummary = {
  readonly date: string
  readonly point: TrainingLoadPoint
  readonly weeklyTss: number
  readonly acuteChronicRatio: number | null
  readonly form: FormState
}

export type TrainingLoadOptions = {
  ctlDays: number
  atlDays: number
  initialCtl?: number
  initialAtl?: number
}

export type FormThresholds = {
  freshTsb: number
  neutralTsbFloor: number
  fatiguedTsbFloor: number
}

export type TrainingPhase = 'Base' | 'Build' | 'Peak' | 'Recovery' | 'Transition'

export type PhaseResult = {
  readonly phase: TrainingPhase
  readonly confidence: number // 0-1
  readonly weeklyTss: number
  readonly lowIntensityPercent: number
  readonly highIntensityPercent: number
  readonly recommendation: string
}

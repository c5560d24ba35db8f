export type RiskLevel = 'Low' | 'Moderate' | 'High' | 'Critical'

export type RiskFactorName = 'recovery' | 'hrvDeviation' | 'rhrElevation' | 'tsb' | 'sleepDebt'

export type RiskFactor = {
  readonly name: RiskFactorName
  readonly value: number
  readonly severity: number // 0-1
  readonly weight: number
  readonly description: string
}

/** Any input may be missing; its factor is then left out. */
export type RiskInput = {
  readonly recoveryAverage: number | null // mean recovery score over the trailing days
  readonly hrvChangePct: number | null // today vs baseline, percent
  readonly rhrChangePct: number | null
  readonly tsb: number | null
  readonly sleepDebtHours: number | null
}

export type RiskResult = {
  readonly score: number
  readonly level: RiskLevel
  readonly factors: readonly RiskFactor[]
  readonly recommendation: string
}

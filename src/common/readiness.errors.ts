import type { ZodIssue } from 'zod'

export type ReadinessErrorCode =
  | 'SERIES_LENGTH_MISMATCH'
  | 'NON_FINITE_SERIES_VALUE'
  | 'INVALID_METRICS_INPUT'
  | 'INVALID_CONFIG'

/**
 * Raised only for contract violations by the caller. Missing or insufficient
 * data is never an error: it produces neutral or unavailable results instead.
 */
export class ReadinessContractError extends Error {
  constructor(
    readonly code: ReadinessErrorCode,
    message: string,
  ) {
    super(message)
    this.name = new.target.name
  }
}

export class SeriesLengthMismatchError extends ReadinessContractError {
  constructor(
    readonly xLength: number,
    readonly yLength: number,
  ) {
    super('SERIES_LENGTH_MISMATCH', `Series lengths differ: x has ${xLength} values, y has ${yLength}`)
  }
}

export class NonFiniteSeriesValueError extends ReadinessContractError {
  constructor(
    readonly series: 'x' | 'y',
    readonly index: number,
  ) {
    super('NON_FINITE_SERIES_VALUE', `Series ${series} has a non-finite value at index ${index}`)
  }
}

export class InvalidMetricsInputError extends ReadinessContractError {
  constructor(
    readonly issues: ZodIssue[],
    what = 'metrics input',
  ) {
    super('INVALID_METRICS_INPUT', `Invalid ${what}: ${formatIssues(issues)}`)
  }
}

export class InvalidReadinessConfigError extends ReadinessContractError {
  constructor(readonly issues: ZodIssue[]) {
    super('INVALID_CONFIG', `Invalid readiness config: ${formatIssues(issues)}`)
  }
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')
}

import { InvalidReadinessConfigError } from '../common/readiness.errors'
import { readinessConfigSchema } from './readiness-config.schema'
import type { ReadinessConfig, ReadinessConfigInput } from './readiness-config.schema'

export const READINESS_CONFIG = Symbol('READINESS_CONFIG')

/** Fills every omitted value with its default and validates the result. */
export function resolveReadinessConfig(overrides: ReadinessConfigInput = {}): ReadinessConfig {
  const parsed = readinessConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    throw new InvalidReadinessConfigError(parsed.error.issues)
  }
  return parsed.data
}

export const defaultReadinessConfig = (): ReadinessConfig => resolveReadinessConfig()

type Env = Record<string, string | undefined>

function numberFromEnv(env: Env, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  return Number.isFinite(value) ? value : undefined
}

/**
 * Reads recalibration overrides from READINESS_* variables:
 * READINESS_CTL_DAYS, READINESS_ATL_DAYS, READINESS_BASELINE_WINDOW_DAYS,
 * READINESS_BASELINE_MIN_SAMPLES, READINESS_ALCOHOL_MAX_PENALTY.
 * Unset or non-numeric variables are ignored.
 */
export function readinessConfigFromEnv(env: Env = process.env): ReadinessConfigInput {
  return {
    trainingLoad: {
      ctlDays: numberFromEnv(env, 'READINESS_CTL_DAYS'),
      atlDays: numberFromEnv(env, 'READINESS_ATL_DAYS'),
    },
    baseline: {
      windowDays: numberFromEnv(env, 'READINESS_BASELINE_WINDOW_DAYS'),
      minSamples: numberFromEnv(env, 'READINESS_BASELINE_MIN_SAMPLES'),
    },
    confounders: {
      alcohol: {
        maxPenalty: numberFromEnv(env, 'READINESS_ALCOHOL_MAX_PENALTY'),
      },
    },
  }
}

import type { z } from 'zod'
import { InvalidMetricsInputError } from './readiness.errors'

/** Validates caller-supplied input at a service boundary. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.infer<T> {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw new InvalidMetricsInputError(parsed.error.issues, what)
  }
  return parsed.data
}

const DAY_KEY_REGEX = /^\d{4}-\d{2}-\d{2}$/
const MS_PER_DAY = 86_400_000

export const isDayKey = (value: string): boolean => {
  if (!DAY_KEY_REGEX.test(value)) return false
  const d = new Date(`${value}T00:00:00Z`)
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value
}

export const dayKeyToUtcMs = (dayKey: string): number => Date.parse(`${dayKey}T00:00:00Z`)

export function addDays(dayKey: string, days: number): string {
  const d = new Date(dayKeyToUtcMs(dayKey))
  d.setUTCDate(d.getUTCDate() + days)
  return d.toISOString().slice(0, 10)
}

export const daysBetween = (from: string, to: string): number =>
  Math.round((dayKeyToUtcMs(to) - dayKeyToUtcMs(from)) / MS_PER_DAY)

/** Inclusive list of day keys from `from` to `to`; empty when `to` precedes `from`. */
export function dayKeyRange(from: string, to: string): string[] {
  const span = daysBetween(from, to)
  const keys: string[] = []
  for (let i = 0; i <= span; i++) keys.push(addDays(from, i))
  return keys
}

/** 0 = Sunday … 6 = Saturday */
export const weekdayOf = (dayKey: string): number => new Date(dayKeyToUtcMs(dayKey)).getUTCDay()

export const isWeekend = (dayKey: string): boolean => {
  const wd = weekdayOf(dayKey)
  return wd === 0 || wd === 6
}

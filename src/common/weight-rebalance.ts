export type SubScore<K extends string> = {
  readonly name: K
  readonly score: number
  readonly available: boolean
  readonly defaultWeight: number
  readonly weight: number
}

export type SubScoreInput<K extends string> = Omit<SubScore<K>, 'weight'>

/**
 * Redistributes the weight of unavailable components proportionally across the
 * available ones so that weights sum to 1. Unavailable components get 0.
 * With nothing available every weight is 0 and callers fall back to a neutral score.
 */
export function rebalanceWeights<K extends string>(components: readonly SubScoreInput<K>[]): SubScore<K>[] {
  const availableTotal = components
    .filter((c) => c.available)
    .reduce((sum, c) => sum + c.defaultWeight, 0)

  return components.map((c) => ({
    ...c,
    weight: availableTotal > 0 && c.available ? c.defaultWeight / availableTotal : 0,
  }))
}

/** Weighted combination of rebalanced sub-scores, or `fallback` when nothing is available. */
export function combineSubScores<K extends string>(subScores: readonly SubScore<K>[], fallback: number): number {
  if (!subScores.some((s) => s.available)) return fallback
  return subScores.reduce((sum, s) => sum + s.score * s.weight, 0)
}

export function findSubScore<K extends string>(subScores: readonly SubScore<K>[], name: K): SubScore<K> | undefined {
  return subScores.find((s) => s.name === name)
}

import type { ReadinessConfig } from '../../config/readiness-config.schema'
import { AlcoholDetector } from './alcohol.detector'
import type { ConfounderDetector } from './confounder.types'
import { IllnessDetector } from './illness.detector'

/** Illness runs first so that it can suppress alcohol attribution. */
export const defaultConfounderDetectors = (config: ReadinessConfig): ConfounderDetector[] => [
  new IllnessDetector(config.confounders.illness),
  new AlcoholDetector(config.confounders.alcohol),
]

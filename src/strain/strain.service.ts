import { Inject, Injectable, Logger } from '@nestjs/common'
import { READINESS_CONFIG } from '../config/readiness-config'
import type { ReadinessConfig } from '../config/readiness-config.schema'
import { parseInput } from '../common/validation'
import { dayKeySchema } from '../types/daily-metric.schema'
import { activitySamplesSchema, athleteProfileSchema } from './strain.schema'
import type { ActivitySample, AthleteProfile, DailyStrain, PowerLoad, RecoverySignal, StrainResult } from './strain.types'
import { dailyStrain, powerTrainingLoad, scoreActivity } from './strain.utils'

@Injectable()
export class StrainService {
  private readonly logger = new Logger(StrainService.name)

  constructor(@Inject(READINESS_CONFIG) private readonly config: ReadinessConfig) {}

  activity(samples: readonly ActivitySample[], profile: AthleteProfile): StrainResult {
    const stream = parseInput(activitySamplesSchema, samples, 'activity samples')
    const athlete = parseInput(athleteProfileSchema, profile, 'athlete profile')

    if (athlete.maxHr <= athlete.restingHr) {
      this.logger.warn(`Max HR ${athlete.maxHr} is not above resting HR ${athlete.restingHr}; heart rate ignored`)
    }
    const result = scoreActivity(stream, athlete, this.config.strain)
    if (result.source === null) {
      this.logger.warn(`No usable heart rate or power in ${stream.length} samples`)
    }
    return result
  }

  powerLoad(samples: readonly ActivitySample[], ftp: number | null): PowerLoad | null {
    const stream = parseInput(activitySamplesSchema, samples, 'activity samples')
    return powerTrainingLoad(stream, ftp, this.config.strain)
  }

  day(
    date: string,
    activities: readonly (readonly ActivitySample[])[],
    profile: AthleteProfile,
    signal: RecoverySignal | null = null,
  ): DailyStrain {
    const day = parseInput(dayKeySchema, date, 'date')
    const scored = activities.map((samples) => this.activity(samples, profile))
    const result = dailyStrain(day, scored, signal, this.config.strain)
    this.logger.debug(`Strain ${day}: ${result.strain.toFixed(1)} (${result.band}) from ${result.activityCount} activities`)
    return result
  }
}

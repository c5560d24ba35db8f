import { DynamicModule, Global, Module } from '@nestjs/common'
import { defaultConfounderDetectors } from '../recovery/confounders/confounder.factory'
import { RECOVERY_CONFOUNDERS } from '../recovery/confounders/confounder.types'
import type { ConfounderDetector } from '../recovery/confounders/confounder.types'
import { READINESS_CONFIG, resolveReadinessConfig } from './readiness-config'
import type { ReadinessConfig, ReadinessConfigInput } from './readiness-config.schema'

export type ReadinessModuleOptions = {
  config?: ReadinessConfigInput
  /** Ordered confounder detectors; defaults to illness then alcohol. */
  confounders?: (config: ReadinessConfig) => ConfounderDetector[]
}

@Global()
@Module({})
export class ReadinessConfigModule {
  static forRoot(options: ReadinessModuleOptions = {}): DynamicModule {
    const confounders = options.confounders ?? defaultConfounderDetectors
    return {
      module: ReadinessConfigModule,
      providers: [
        { provide: READINESS_CONFIG, useFactory: () => resolveReadinessConfig(options.config) },
        { provide: RECOVERY_CONFOUNDERS, useFactory: confounders, inject: [READINESS_CONFIG] },
      ],
      exports: [READINESS_CONFIG, RECOVERY_CONFOUNDERS],
    }
  }
}

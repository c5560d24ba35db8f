import { DynamicModule, Module } from '@nestjs/common'
import { BaselineModule } from '../baseline/baseline.module'
import { ReadinessConfigModule } from '../config/readiness-config.module'
import type { ReadinessModuleOptions } from '../config/readiness-config.module'
import { CorrelationModule } from '../correlation/correlation.module'
import { OvertrainingRiskModule } from '../overtraining-risk/overtraining-risk.module'
import { RecoveryModule } from '../recovery/recovery.module'
import { SleepModule } from '../sleep/sleep.module'
import { StrainModule } from '../strain/strain.module'
import { TrainingLoadModule } from '../training-load/training-load.module'
import { TrainingPhaseModule } from '../training-phase/training-phase.module'
import { ReadinessService } from './readiness.service'

const FEATURE_MODULES = [
  BaselineModule,
  TrainingLoadModule,
  RecoveryModule,
  SleepModule,
  StrainModule,
  OvertrainingRiskModule,
  TrainingPhaseModule,
  CorrelationModule,
]

@Module({})
export class ReadinessModule {
  static forRoot(options: ReadinessModuleOptions = {}): DynamicModule {
    return {
      module: ReadinessModule,
      imports: [ReadinessConfigModule.forRoot(options), ...FEATURE_MODULES],
      providers: [ReadinessService],
      exports: [ReadinessService, ...FEATURE_MODULES],
    }
  }
}

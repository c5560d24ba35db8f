import { Module } from '@nestjs/common'
import { OvertrainingRiskService } from './overtraining-risk.service'

@Module({
  providers: [OvertrainingRiskService],
  exports: [OvertrainingRiskService],
})
export class OvertrainingRiskModule {}

import { Module } from '@nestjs/common'
import { TrainingPhaseService } from './training-phase.service'

@Module({
  providers: [TrainingPhaseService],
  exports: [TrainingPhaseService],
})
export class TrainingPhaseModule {}

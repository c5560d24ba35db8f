import { Module } from '@nestjs/common'
import { TrainingLoadService } from './training-load.service'

@Module({
  providers: [TrainingLoadService],
  exports: [TrainingLoadService],
})
export class TrainingLoadModule {}

import { Module } from '@nestjs/common'
import { RecoveryService } from './recovery.service'

/** Expects READINESS_CONFIG and RECOVERY_CONFOUNDERS from ReadinessModule.forRoot. */
@Module({
  providers: [RecoveryService],
  exports: [RecoveryService],
})
export class RecoveryModule {}

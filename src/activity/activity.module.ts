import { Module } from '@nestjs/common';
import { PersistenceModule } from '../persistence/persistence.module';
import { ActivityLedger } from './activity-ledger.service';

@Module({
  imports: [PersistenceModule],
  providers: [ActivityLedger],
  exports: [ActivityLedger],
})
export class ActivityModule {}

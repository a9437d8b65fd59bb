import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { PayoutEngine } from './application/payout-engine.service';

@Module({
  imports: [LedgerModule],
  providers: [PayoutEngine],
  exports: [PayoutEngine],
})
export class PayoutsModule {}

import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { LedgerService } from './application/ledger.service';
import { LEDGER_REPOSITORY } from './domain/ledger.repository';
import { MongoLedgerRepository } from './infrastructure/repositories/mongo-ledger.repository';
import { LedgerAccountDocument, LedgerAccountSchema } from './infrastructure/schemas/ledger-account.schema';
import { LedgerController } from './presentation/ledger.controller';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: LedgerAccountDocument.name, schema: LedgerAccountSchema },
    ]),
  ],
  controllers: [LedgerController],
  providers: [
    LedgerService,
    {
      provide: LEDGER_REPOSITORY,
      useClass: MongoLedgerRepository,
    },
  ],
  exports: [LedgerService],
})
export class LedgerModule {}

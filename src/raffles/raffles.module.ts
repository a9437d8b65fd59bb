import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { RafflesService } from './application/raffles.service';
import { RaffleEventLogService } from './application/raffle-event-log.service';
import { RafflesController } from './presentation/raffles.controller';
import { RaffleDocument, RaffleSchema } from './infrastructure/schemas/raffle.schema';
import { RaffleEventDocument, RaffleEventSchema } from './infrastructure/schemas/raffle-event.schema';
import { MongoRaffleRepository } from './infrastructure/repositories/mongo-raffle.repository';
import { MongoRaffleEventRepository } from './infrastructure/repositories/mongo-raffle-event.repository';
import { RAFFLE_REPOSITORY } from './domain/raffle.repository';
import { RAFFLE_EVENT_REPOSITORY } from './domain/raffle-event.repository';
import { LedgerModule } from '../ledger/ledger.module';
import { PayoutsModule } from '../payouts/payouts.module';
import { RandomnessModule } from '../randomness/randomness.module';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: RaffleDocument.name, schema: RaffleSchema },
      { name: RaffleEventDocument.name, schema: RaffleEventSchema },
    ]),
    LedgerModule,
    PayoutsModule,
    RandomnessModule,
  ],
  controllers: [RafflesController],
  providers: [
    RafflesService,
    RaffleEventLogService,
    {
      provide: RAFFLE_REPOSITORY,
      useClass: MongoRaffleRepository,
    },
    {
      provide: RAFFLE_EVENT_REPOSITORY,
      useClass: MongoRaffleEventRepository,
    },
  ],
  exports: [RafflesService, RaffleEventLogService],
})
export class RafflesModule {}

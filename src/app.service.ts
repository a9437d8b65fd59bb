import { Injectable } from '@nestjs/common';
import { ConfigService } from './database/config.service';
import { LedgerService } from './ledger/application/ledger.service';
import { RaffleEventLogService } from './raffles/application/raffle-event-log.service';
import { RafflesService } from './raffles/application/raffles.service';

@Injectable()
export class AppService {
  constructor(
    private readonly rafflesService: RafflesService,
    private readonly eventLog: RaffleEventLogService,
    private readonly ledgerService: LedgerService,
    private readonly configService: ConfigService,
  ) {}

  getStatus() {
    return {
      message: 'Raffle API is running',
      vrfProvider: this.configService.vrfProvider,
      payoutPolicy: this.configService.payoutPolicy,
    };
  }

  async getStats() {
    const raffle = await this.rafflesService.getRaffle();
    const vaultBalance = await this.ledgerService.balanceOf(this.configService.raffleVaultAddress);

    return {
      state: raffle.state,
      playersCount: raffle.playersCount,
      awaitingRandomness: raffle.pendingRequestId !== null,
      vaultBalance: vaultBalance.toString(),
      sessionsOpened: await this.eventLog.count('RaffleOpened'),
      winnersPicked: await this.eventLog.count('RaffleWinnerPicked'),
      recentWinner: raffle.recentWinner,
    };
  }
}

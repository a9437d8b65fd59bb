import { Inject, Injectable, Logger } from '@nestjs/common';
import { normalizeAddress } from '../../common/ethereum';
import { ConfigService } from '../../database/config.service';
import { LedgerService } from '../../ledger/application/ledger.service';
import { PayoutEngine } from '../../payouts/application/payout-engine.service';
import {
  RANDOMNESS_ORACLE_CLIENT,
  RandomnessConsumer,
  RandomnessOracleClient,
  RandomWordsRequest,
} from '../../randomness/domain/randomness-oracle';
import { UnknownRandomnessRequestError } from '../../randomness/domain/randomness.errors';
import { RaffleEvent } from '../domain/raffle-event';
import { Raffle, RaffleState } from '../domain/raffle.entity';
import { IRaffleRepository, RAFFLE_REPOSITORY } from '../domain/raffle.repository';
import { RaffleResponseDto } from './dto/raffle-response.dto';
import { RaffleEventLogService } from './raffle-event-log.service';
import { SerialExecutor } from './serial-executor';

/** Reverses one side effect of an operation that did not complete. */
type Compensation = () => Promise<void>;

/**
 * Drives the raffle state machine.
 *
 * Every mutating operation runs through one serial executor and works on a clone of the
 * stored raffle. Ledger side effects register a compensation as they happen. When any
 * later step throws, including the save or the event append, the stored raffle is put
 * back and the compensations run in reverse order.
 */
@Injectable()
export class RafflesService implements RandomnessConsumer {
  private readonly logger = new Logger(RafflesService.name);
  private readonly executor = new SerialExecutor();

  constructor(
    @Inject(RAFFLE_REPOSITORY)
    private readonly raffleRepository: IRaffleRepository,
    @Inject(RANDOMNESS_ORACLE_CLIENT)
    private readonly oracle: RandomnessOracleClient,
    private readonly ledgerService: LedgerService,
    private readonly payoutEngine: PayoutEngine,
    private readonly eventLog: RaffleEventLogService,
    private readonly configService: ConfigService,
  ) {}

  async openRaffle(caller: string, fee: bigint): Promise<RaffleResponseDto> {
    const owner = normalizeAddress(caller);
    const raffle = await this.transact(async (staged) => staged.open(owner, fee));
    this.logger.log(`Raffle opened by ${owner} with entrance fee ${fee}`);
    return this.toResponseDto(raffle);
  }

  async enterRaffle(caller: string, payment: bigint): Promise<RaffleResponseDto> {
    const player = normalizeAddress(caller);
    const vault = this.configService.raffleVaultAddress;
    const raffle = await this.transact(async (staged, compensate) => {
      const events = staged.enter(player, payment);
      await this.ledgerService.deposit(vault, payment);
      compensate(async () => {
        await this.ledgerService.withdraw(vault, payment);
      });
      return events;
    });
    this.logger.log(`${player} entered with ${payment} (${raffle.players.length} entries)`);
    return this.toResponseDto(raffle);
  }

  /**
   * Close entries. With players, a randomness request goes out and this returns without
   * waiting for it; the winner is drawn when the oracle calls {@link fulfillRandomWords}.
   */
  async endRaffle(caller: string): Promise<RaffleResponseDto> {
    const owner = normalizeAddress(caller);
    const raffle = await this.transact(async (staged) => {
      if (!staged.close(owner)) {
        this.logger.log(`Raffle ended by ${owner} with no players, session reset`);
        return [];
      }

      const requestId = await this.oracle.requestRandomWords(this, this.randomWordsRequest());
      this.logger.log(`Raffle ended by ${owner}, randomness request ${requestId} issued`);
      return staged.recordRandomnessRequest(requestId);
    });
    return this.toResponseDto(raffle);
  }

  /**
   * Oracle callback. Picks the winner, pays out, and resets the session. A failed payout
   * rolls the raffle back to awaiting randomness.
   */
  async fulfillRandomWords(requestId: bigint, randomWords: bigint[]): Promise<void> {
    await this.transact(async (staged, compensate) => {
      if (staged.pendingRequestId !== requestId) {
        this.logger.warn(`Rejecting fulfillment for request ${requestId}, raffle awaits ${staged.pendingRequestId}`);
        throw new UnknownRandomnessRequestError(requestId);
      }

      const owner = staged.owner;
      if (owner === null) {
        throw new Error(`Raffle awaiting request ${requestId} has no owner`);
      }

      const { winner, events } = staged.pickWinner(randomWords);
      const receipt = await this.payoutEngine.distribute(owner, winner);
      compensate(() => this.payoutEngine.refund(receipt));
      staged.completePayout();

      this.logger.log(
        `Winner ${winner} picked from ${staged.previousSessionPlayers.length} entries, ` +
          `paid ${receipt.winnerPayout} (owner fee ${receipt.ownerFee})`,
      );
      return events;
    });
  }

  async getRaffle(): Promise<RaffleResponseDto> {
    return this.toResponseDto(await this.raffleRepository.load());
  }

  async getRaffleOwner(): Promise<string | null> {
    return (await this.raffleRepository.load()).owner;
  }

  async getRafflePreviousOwner(): Promise<string | null> {
    return (await this.raffleRepository.load()).previousOwner;
  }

  async getEntranceFee(): Promise<bigint> {
    return (await this.raffleRepository.load()).entranceFee;
  }

  async getRaffleState(): Promise<RaffleState> {
    return (await this.raffleRepository.load()).state;
  }

  async getPlayer(index: number): Promise<string> {
    return (await this.raffleRepository.load()).getPlayer(index);
  }

  async getPlayerFromPreviousSession(index: number): Promise<string> {
    return (await this.raffleRepository.load()).getPlayerFromPreviousSession(index);
  }

  async getPlayersCount(): Promise<number> {
    return (await this.raffleRepository.load()).players.length;
  }

  async getRecentWinner(): Promise<string | null> {
    return (await this.raffleRepository.load()).recentWinner;
  }

  private transact(
    mutate: (staged: Raffle, compensate: (compensation: Compensation) => void) => Promise<RaffleEvent[]>,
  ): Promise<Raffle> {
    return this.executor.run(async () => {
      const current = await this.raffleRepository.load();
      const staged = current.clone();
      const compensations: Compensation[] = [];
      let stored = false;

      try {
        const events = await mutate(staged, (compensation) => compensations.push(compensation));
        const saved = await this.raffleRepository.save(staged);
        stored = true;
        await this.eventLog.append(events);
        return saved;
      } catch (error) {
        await this.rollback(stored ? current : null, compensations);
        throw error;
      }
    });
  }

  /**
   * Best effort: every step is attempted even when an earlier one fails, and failures are
   * logged. The caller still receives the error that triggered the rollback.
   */
  private async rollback(previous: Raffle | null, compensations: Compensation[]): Promise<void> {
    if (previous) {
      try {
        await this.raffleRepository.save(previous);
      } catch (error) {
        this.logger.error('Could not restore the raffle after a failed operation', error);
      }
    }

    for (const compensation of [...compensations].reverse()) {
      try {
        await compensation();
      } catch (error) {
        this.logger.error('Could not reverse a ledger change after a failed operation', error);
      }
    }
  }

  private randomWordsRequest(): RandomWordsRequest {
    return {
      keyHash: this.configService.vrfKeyHash,
      subscriptionId: this.configService.vrfSubscriptionId,
      requestConfirmations: this.configService.vrfRequestConfirmations,
      callbackGasLimit: this.configService.vrfCallbackGasLimit,
      numWords: this.configService.vrfNumWords,
      nativePayment: false,
    };
  }

  private toResponseDto(raffle: Raffle): RaffleResponseDto {
    return {
      owner: raffle.owner,
      previousOwner: raffle.previousOwner,
      entranceFee: raffle.entranceFee.toString(),
      state: raffle.state,
      players: [...raffle.players],
      playersCount: raffle.players.length,
      previousSessionPlayers: [...raffle.previousSessionPlayers],
      recentWinner: raffle.recentWinner,
      pendingRequestId: raffle.pendingRequestId?.toString() ?? null,
      updatedAt: raffle.updatedAt.toISOString(),
    };
  }
}

import { sameAddress } from '../../common/ethereum';
import { InvalidRandomWordsError } from '../../randomness/domain/randomness.errors';
import { RaffleEvent } from './raffle-event';
import {
  AlreadyInSessionError,
  InsufficientFeeError,
  NoPlayersError,
  NotOpenError,
  NotOwnerError,
  OwnerCannotEnterError,
  PlayerIndexOutOfRangeError,
  RandomnessPendingError,
} from './raffle.errors';

export enum RaffleState {
  OPEN = 'open',
  CLOSED = 'closed',
}

export interface IRaffle {
  id?: string;
  owner: string | null;
  previousOwner: string | null;
  entranceFee: bigint;
  state: RaffleState;
  players: string[];
  previousSessionPlayers: string[];
  recentWinner: string | null;
  pendingRequestId: bigint | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Raffle lifecycle. Every transition either throws before touching any field or applies
 * completely, and returns the events it emitted.
 *
 * CLOSED --open--> OPEN --close--> CLOSED (reset when nobody entered)
 *                                  CLOSED + pendingRequestId --pickWinner/completePayout--> CLOSED (reset)
 */
export class Raffle implements IRaffle {
  id?: string;
  owner: string | null;
  previousOwner: string | null;
  entranceFee: bigint;
  state: RaffleState;
  players: string[];
  previousSessionPlayers: string[];
  recentWinner: string | null;
  pendingRequestId: bigint | null;
  createdAt: Date;
  updatedAt: Date;

  constructor(partial: Partial<IRaffle>) {
    this.id = partial.id;
    this.owner = partial.owner ?? null;
    this.previousOwner = partial.previousOwner ?? null;
    this.entranceFee = partial.entranceFee ?? 0n;
    this.state = partial.state || RaffleState.CLOSED;
    this.players = partial.players ? [...partial.players] : [];
    this.previousSessionPlayers = partial.previousSessionPlayers ? [...partial.previousSessionPlayers] : [];
    this.recentWinner = partial.recentWinner ?? null;
    this.pendingRequestId = partial.pendingRequestId ?? null;
    this.createdAt = partial.createdAt || new Date();
    this.updatedAt = partial.updatedAt || new Date();
  }

  static initial(): Raffle {
    return new Raffle({});
  }

  /**
   * Working copy for staged changes; the original stays untouched until the copy is saved.
   */
  clone(): Raffle {
    return new Raffle(this);
  }

  open(caller: string, fee: bigint): RaffleEvent[] {
    if (this.owner !== null) {
      throw new AlreadyInSessionError(this.owner);
    }

    this.owner = caller;
    this.state = RaffleState.OPEN;
    this.entranceFee = fee;
    this.touch();

    return [{ name: 'RaffleOpened', owner: caller, fee }];
  }

  /**
   * Overpayment is accepted and kept. The same address may enter more than once.
   */
  enter(caller: string, payment: bigint): RaffleEvent[] {
    if (sameAddress(caller, this.owner)) {
      throw new OwnerCannotEnterError();
    }
    if (this.state !== RaffleState.OPEN) {
      throw new NotOpenError();
    }
    if (payment < this.entranceFee) {
      throw new InsufficientFeeError(this.entranceFee, payment);
    }

    this.players.push(caller);
    this.touch();

    return [{ name: 'RaffleEntered', player: caller }];
  }

  /**
   * Stop taking entries. Returns whether a winner has to be drawn; when nobody entered the
   * session is reset on the spot.
   */
  close(caller: string): boolean {
    if (!sameAddress(caller, this.owner)) {
      throw new NotOwnerError(caller);
    }
    if (this.pendingRequestId !== null) {
      throw new RandomnessPendingError(this.pendingRequestId);
    }

    this.state = RaffleState.CLOSED;
    this.touch();

    if (this.players.length === 0) {
      this.resetSession();
      return false;
    }
    return true;
  }

  recordRandomnessRequest(requestId: bigint): RaffleEvent[] {
    this.pendingRequestId = requestId;
    this.touch();
    return [{ name: 'RequestedRaffleWinner', requestId }];
  }

  /**
   * Winner is `players[randomWords[0] mod players.length]`. The entry list moves to
   * `previousSessionPlayers`.
   */
  pickWinner(randomWords: bigint[]): { winner: string; events: RaffleEvent[] } {
    if (this.players.length === 0) {
      throw new NoPlayersError();
    }
    if (randomWords.length === 0) {
      throw new InvalidRandomWordsError(1, 0);
    }

    const winnerIndex = Number(randomWords[0] % BigInt(this.players.length));
    const winner = this.players[winnerIndex];

    this.recentWinner = winner;
    this.previousSessionPlayers = this.players;
    this.players = [];
    this.touch();

    return { winner, events: [{ name: 'RaffleWinnerPicked', winner }] };
  }

  completePayout(): void {
    this.previousOwner = this.owner;
    this.resetSession();
  }

  getPlayer(index: number): string {
    return Raffle.at(this.players, index);
  }

  getPlayerFromPreviousSession(index: number): string {
    return Raffle.at(this.previousSessionPlayers, index);
  }

  private resetSession(): void {
    this.owner = null;
    this.entranceFee = 0n;
    this.pendingRequestId = null;
    this.touch();
  }

  private touch(): void {
    this.updatedAt = new Date();
  }

  private static at(list: string[], index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= list.length) {
      throw new PlayerIndexOutOfRangeError(index, list.length);
    }
    return list[index];
  }
}

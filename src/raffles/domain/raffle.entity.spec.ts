import { ALICE, BOB, CAROL, ONE_ETHER, OWNER } from '../../../test/raffle-harness';
import { Raffle, RaffleState } from './raffle.entity';
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

function openRaffle(fee = ONE_ETHER): Raffle {
  const raffle = Raffle.initial();
  raffle.open(OWNER, fee);
  return raffle;
}

describe('Raffle', () => {
  it('starts closed with no session', () => {
    const raffle = Raffle.initial();

    expect(raffle.state).toBe(RaffleState.CLOSED);
    expect(raffle.owner).toBeNull();
    expect(raffle.entranceFee).toBe(0n);
    expect(raffle.players).toEqual([]);
  });

  describe('open', () => {
    it('records the owner and fee and emits RaffleOpened', () => {
      const raffle = Raffle.initial();

      const events = raffle.open(OWNER, ONE_ETHER);

      expect(events).toEqual([{ name: 'RaffleOpened', owner: OWNER, fee: ONE_ETHER }]);
      expect(raffle.state).toBe(RaffleState.OPEN);
      expect(raffle.owner).toBe(OWNER);
      expect(raffle.entranceFee).toBe(ONE_ETHER);
    });

    it('allows a zero entrance fee', () => {
      const raffle = Raffle.initial();
      raffle.open(OWNER, 0n);
      expect(raffle.entranceFee).toBe(0n);
    });

    it('rejects a second open while a session is in progress', () => {
      const raffle = openRaffle();

      expect(() => raffle.open(ALICE, 5n)).toThrow(AlreadyInSessionError);
      expect(raffle.owner).toBe(OWNER);
      expect(raffle.entranceFee).toBe(ONE_ETHER);
    });

    it('rejects open while a winner is still being drawn', () => {
      const raffle = openRaffle();
      raffle.enter(ALICE, ONE_ETHER);
      raffle.close(OWNER);
      raffle.recordRandomnessRequest(1n);

      expect(() => raffle.open(BOB, 1n)).toThrow(AlreadyInSessionError);
    });
  });

  describe('enter', () => {
    it('appends the player and emits RaffleEntered', () => {
      const raffle = openRaffle();

      const events = raffle.enter(ALICE, ONE_ETHER);

      expect(events).toEqual([{ name: 'RaffleEntered', player: ALICE }]);
      expect(raffle.players).toEqual([ALICE]);
    });

    it('keeps overpayment and lets the same address enter twice', () => {
      const raffle = openRaffle();

      raffle.enter(ALICE, ONE_ETHER * 5n);
      raffle.enter(ALICE, ONE_ETHER);

      expect(raffle.players).toEqual([ALICE, ALICE]);
    });

    it('rejects the owner before looking at the fee', () => {
      const raffle = openRaffle();

      expect(() => raffle.enter(OWNER, 0n)).toThrow(OwnerCannotEnterError);
    });

    it('rejects the owner even when the raffle is closed', () => {
      const raffle = openRaffle();
      raffle.enter(ALICE, ONE_ETHER);
      raffle.close(OWNER);

      expect(() => raffle.enter(OWNER, ONE_ETHER)).toThrow(OwnerCannotEnterError);
    });

    it('rejects entries while closed', () => {
      const raffle = Raffle.initial();

      expect(() => raffle.enter(ALICE, ONE_ETHER)).toThrow(NotOpenError);
    });

    it('rejects a payment below the fee with both amounts', () => {
      const raffle = openRaffle();

      let caught: unknown;
      try {
        raffle.enter(ALICE, ONE_ETHER - 1n);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InsufficientFeeError);
      if (caught instanceof InsufficientFeeError) {
        expect(caught.required).toBe(ONE_ETHER);
        expect(caught.paid).toBe(ONE_ETHER - 1n);
        expect(caught.code).toBe('InsufficientFee');
      }
      expect(raffle.players).toEqual([]);
    });
  });

  describe('close', () => {
    it('only lets the owner close', () => {
      const raffle = openRaffle();

      expect(() => raffle.close(ALICE)).toThrow(NotOwnerError);
      expect(raffle.state).toBe(RaffleState.OPEN);
    });

    it('rejects close when no session exists', () => {
      expect(() => Raffle.initial().close(OWNER)).toThrow(NotOwnerError);
    });

    it('resets the session when nobody entered', () => {
      const raffle = openRaffle();

      expect(raffle.close(OWNER)).toBe(false);
      expect(raffle.state).toBe(RaffleState.CLOSED);
      expect(raffle.owner).toBeNull();
      expect(raffle.entranceFee).toBe(0n);
      expect(raffle.previousOwner).toBeNull();
    });

    it('keeps the players and the owner when a winner has to be drawn', () => {
      const raffle = openRaffle();
      raffle.enter(ALICE, ONE_ETHER);

      expect(raffle.close(OWNER)).toBe(true);
      expect(raffle.state).toBe(RaffleState.CLOSED);
      expect(raffle.owner).toBe(OWNER);
      expect(raffle.players).toEqual([ALICE]);
    });

    it('refuses to close again while randomness is pending', () => {
      const raffle = openRaffle();
      raffle.enter(ALICE, ONE_ETHER);
      raffle.close(OWNER);
      const events = raffle.recordRandomnessRequest(42n);

      expect(events).toEqual([{ name: 'RequestedRaffleWinner', requestId: 42n }]);
      expect(() => raffle.close(OWNER)).toThrow(RandomnessPendingError);
    });
  });

  describe('pickWinner', () => {
    function awaitingRaffle(): Raffle {
      const raffle = openRaffle();
      raffle.enter(ALICE, ONE_ETHER);
      raffle.enter(BOB, ONE_ETHER);
      raffle.enter(CAROL, ONE_ETHER);
      raffle.close(OWNER);
      raffle.recordRandomnessRequest(1n);
      return raffle;
    }

    it('picks players[word mod count] and snapshots the entries', () => {
      const raffle = awaitingRaffle();

      const { winner, events } = raffle.pickWinner([7n]);

      expect(winner).toBe(BOB);
      expect(events).toEqual([{ name: 'RaffleWinnerPicked', winner: BOB }]);
      expect(raffle.recentWinner).toBe(BOB);
      expect(raffle.previousSessionPlayers).toEqual([ALICE, BOB, CAROL]);
      expect(raffle.players).toEqual([]);
    });

    it('uses only the first word', () => {
      const raffle = awaitingRaffle();

      expect(raffle.pickWinner([3n, 1n]).winner).toBe(ALICE);
    });

    it('handles 256-bit words', () => {
      const raffle = awaitingRaffle();
      const word = 2n ** 256n - 1n;

      expect(raffle.pickWinner([word]).winner).toBe([ALICE, BOB, CAROL][Number(word % 3n)]);
    });

    it('fails without players', () => {
      expect(() => Raffle.initial().pickWinner([1n])).toThrow(NoPlayersError);
    });

    it('completes the cycle by moving the owner to previousOwner', () => {
      const raffle = awaitingRaffle();
      raffle.pickWinner([0n]);

      raffle.completePayout();

      expect(raffle.previousOwner).toBe(OWNER);
      expect(raffle.owner).toBeNull();
      expect(raffle.entranceFee).toBe(0n);
      expect(raffle.pendingRequestId).toBeNull();
      expect(raffle.previousSessionPlayers).toEqual([ALICE, BOB, CAROL]);
    });
  });

  describe('player lookups', () => {
    it('returns players by index', () => {
      const raffle = openRaffle();
      raffle.enter(ALICE, ONE_ETHER);
      raffle.enter(BOB, ONE_ETHER);

      expect(raffle.getPlayer(1)).toBe(BOB);
    });

    it('rejects an index past the end', () => {
      const raffle = openRaffle();
      raffle.enter(ALICE, ONE_ETHER);

      expect(() => raffle.getPlayer(1)).toThrow(PlayerIndexOutOfRangeError);
      expect(() => raffle.getPlayerFromPreviousSession(0)).toThrow(PlayerIndexOutOfRangeError);
    });
  });

  it('clones without sharing the player lists', () => {
    const raffle = openRaffle();
    raffle.enter(ALICE, ONE_ETHER);

    const copy = raffle.clone();
    copy.enter(BOB, ONE_ETHER);

    expect(raffle.players).toEqual([ALICE]);
    expect(copy.players).toEqual([ALICE, BOB]);
  });
});

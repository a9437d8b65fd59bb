import { AppService } from './app.service';
import { RaffleEventLogService } from './raffles/application/raffle-event-log.service';
import { ALICE, BOB, createRaffleHarness, ONE_ETHER, OWNER } from '../test/raffle-harness';

describe('AppService', () => {
  it('summarizes the raffle, the vault and the event log', async () => {
    const h = createRaffleHarness();
    const app = new AppService(h.raffles, new RaffleEventLogService(h.eventRepository), h.ledger, h.config);

    await h.raffles.openRaffle(OWNER, ONE_ETHER);
    await h.raffles.enterRaffle(ALICE, ONE_ETHER);
    await h.raffles.enterRaffle(BOB, ONE_ETHER);
    await h.raffles.endRaffle(OWNER);

    expect(await app.getStats()).toEqual({
      state: 'closed',
      playersCount: 2,
      awaitingRandomness: true,
      vaultBalance: '2000000000000000000',
      sessionsOpened: 1,
      winnersPicked: 0,
      recentWinner: null,
    });

    await h.coordinator.fulfillRandomWords(1n, [0n]);

    expect(await app.getStats()).toMatchObject({
      playersCount: 0,
      awaitingRandomness: false,
      vaultBalance: '0',
      winnersPicked: 1,
      recentWinner: ALICE,
    });
  });

  it('reports the active providers', () => {
    const h = createRaffleHarness({ PAYOUT_POLICY: 'partial' });
    const app = new AppService(h.raffles, new RaffleEventLogService(h.eventRepository), h.ledger, h.config);

    expect(app.getStatus()).toEqual({
      message: 'Raffle API is running',
      vrfProvider: 'mock',
      payoutPolicy: 'partial',
    });
  });
});

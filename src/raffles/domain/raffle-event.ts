export type RaffleEvent =
  | { name: 'RaffleOpened'; owner: string; fee: bigint }
  | { name: 'RaffleEntered'; player: string }
  | { name: 'RequestedRaffleWinner'; requestId: bigint }
  | { name: 'RaffleWinnerPicked'; winner: string };

export type RaffleEventName = RaffleEvent['name'];

export interface RaffleEventRecord {
  sequence: number;
  event: RaffleEvent;
  emittedAt: Date;
}

/**
 * Event fields as strings, the form they are stored and served in.
 */
export function eventArgs(event: RaffleEvent): Record<string, string> {
  switch (event.name) {
    case 'RaffleOpened':
      return { owner: event.owner, fee: event.fee.toString() };
    case 'RaffleEntered':
      return { player: event.player };
    case 'RequestedRaffleWinner':
      return { requestId: event.requestId.toString() };
    case 'RaffleWinnerPicked':
      return { winner: event.winner };
  }
}

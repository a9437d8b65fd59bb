import { RaffleEvent, RaffleEventName, RaffleEventRecord } from './raffle-event';

/**
 * Append-only store. Sequence numbers start at 1 and never repeat.
 */
export interface IRaffleEventRepository {
  append(events: RaffleEvent[]): Promise<RaffleEventRecord[]>;
  findAll(): Promise<RaffleEventRecord[]>;
  countByName(name: RaffleEventName): Promise<number>;
}

export const RAFFLE_EVENT_REPOSITORY = 'RAFFLE_EVENT_REPOSITORY';

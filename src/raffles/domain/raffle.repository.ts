import { Raffle } from './raffle.entity';

/**
 * Holds the single raffle. `load` returns a fresh initial raffle when nothing is stored yet.
 */
export interface IRaffleRepository {
  load(): Promise<Raffle>;
  save(raffle: Raffle): Promise<Raffle>;
}

export const RAFFLE_REPOSITORY = 'RAFFLE_REPOSITORY';

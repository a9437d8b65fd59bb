import { Raffle } from '../../src/raffles/domain/raffle.entity';
import { IRaffleRepository } from '../../src/raffles/domain/raffle.repository';

export class InMemoryRaffleRepository implements IRaffleRepository {
  private stored: Raffle | null = null;
  saves = 0;

  async load(): Promise<Raffle> {
    return this.stored ? this.stored.clone() : Raffle.initial();
  }

  async save(raffle: Raffle): Promise<Raffle> {
    this.saves++;
    this.stored = raffle.clone();
    return this.stored.clone();
  }
}

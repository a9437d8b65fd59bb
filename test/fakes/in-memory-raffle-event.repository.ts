import { RaffleEvent, RaffleEventName, RaffleEventRecord } from '../../src/raffles/domain/raffle-event';
import { IRaffleEventRepository } from '../../src/raffles/domain/raffle-event.repository';

export class InMemoryRaffleEventRepository implements IRaffleEventRepository {
  readonly records: RaffleEventRecord[] = [];

  async append(events: RaffleEvent[]): Promise<RaffleEventRecord[]> {
    const appended = events.map((event, i) => ({
      sequence: this.records.length + i + 1,
      event,
      emittedAt: new Date(),
    }));
    this.records.push(...appended);
    return appended;
  }

  async findAll(): Promise<RaffleEventRecord[]> {
    return [...this.records];
  }

  async countByName(name: RaffleEventName): Promise<number> {
    return this.records.filter((record) => record.event.name === name).length;
  }

  names(): RaffleEventName[] {
    return this.records.map((record) => record.event.name);
  }
}

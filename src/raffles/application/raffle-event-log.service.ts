import { Inject, Injectable, Logger } from '@nestjs/common';
import { eventArgs, RaffleEvent, RaffleEventName, RaffleEventRecord } from '../domain/raffle-event';
import { IRaffleEventRepository, RAFFLE_EVENT_REPOSITORY } from '../domain/raffle-event.repository';
import { RaffleEventResponseDto } from './dto/raffle-event-response.dto';

@Injectable()
export class RaffleEventLogService {
  private readonly logger = new Logger(RaffleEventLogService.name);

  constructor(
    @Inject(RAFFLE_EVENT_REPOSITORY)
    private readonly eventRepository: IRaffleEventRepository,
  ) {}

  async append(events: RaffleEvent[]): Promise<RaffleEventRecord[]> {
    if (events.length === 0) return [];

    const records = await this.eventRepository.append(events);
    for (const record of records) {
      const args = Object.entries(eventArgs(record.event))
        .map(([key, value]) => `${key}=${value}`)
        .join(' ');
      this.logger.log(`#${record.sequence} ${record.event.name} ${args}`);
    }
    return records;
  }

  async findAll(): Promise<RaffleEventResponseDto[]> {
    const records = await this.eventRepository.findAll();
    return records.map((record) => ({
      sequence: record.sequence,
      name: record.event.name,
      args: eventArgs(record.event),
      emittedAt: record.emittedAt.toISOString(),
    }));
  }

  async count(name: RaffleEventName): Promise<number> {
    return this.eventRepository.countByName(name);
  }
}

import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { eventArgs, RaffleEvent, RaffleEventName, RaffleEventRecord } from '../../domain/raffle-event';
import { IRaffleEventRepository } from '../../domain/raffle-event.repository';
import { RaffleEventDocument } from '../schemas/raffle-event.schema';

@Injectable()
export class MongoRaffleEventRepository implements IRaffleEventRepository {
  constructor(
    @InjectModel(RaffleEventDocument.name)
    private readonly eventModel: Model<RaffleEventDocument>,
  ) {}

  /**
   * Sequence numbers continue from the highest stored one. Appends are serialized by the
   * raffle service, and the unique index rejects a duplicate if they ever are not.
   */
  async append(events: RaffleEvent[]): Promise<RaffleEventRecord[]> {
    const last = await this.eventModel.findOne().sort({ sequence: -1 }).exec();
    const first = (last?.sequence ?? 0) + 1;

    const emittedAt = new Date();
    const records = events.map((event, i) => ({ sequence: first + i, event, emittedAt }));

    await this.eventModel.insertMany(
      records.map((record) => ({
        sequence: record.sequence,
        name: record.event.name,
        args: eventArgs(record.event),
        emittedAt: record.emittedAt,
      })),
    );
    return records;
  }

  async findAll(): Promise<RaffleEventRecord[]> {
    const docs = await this.eventModel.find().sort({ sequence: 1 }).exec();
    return docs.map((doc) => this.toRecord(doc));
  }

  async countByName(name: RaffleEventName): Promise<number> {
    return this.eventModel.countDocuments({ name }).exec();
  }

  private toRecord(doc: RaffleEventDocument): RaffleEventRecord {
    return {
      sequence: doc.sequence,
      event: this.toEvent(doc.name, doc.args),
      emittedAt: doc.emittedAt,
    };
  }

  private toEvent(name: string, args: Map<string, string>): RaffleEvent {
    const arg = (key: string): string => {
      const value = args.get(key);
      if (value === undefined) {
        throw new Error(`Stored ${name} event is missing "${key}"`);
      }
      return value;
    };

    switch (name) {
      case 'RaffleOpened':
        return { name, owner: arg('owner'), fee: BigInt(arg('fee')) };
      case 'RaffleEntered':
        return { name, player: arg('player') };
      case 'RequestedRaffleWinner':
        return { name, requestId: BigInt(arg('requestId')) };
      case 'RaffleWinnerPicked':
        return { name, winner: arg('winner') };
      default:
        throw new Error(`Unknown raffle event "${name}"`);
    }
  }
}

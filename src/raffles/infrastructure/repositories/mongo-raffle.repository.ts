import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Raffle } from '../../domain/raffle.entity';
import { IRaffleRepository } from '../../domain/raffle.repository';
import { CURRENT_RAFFLE_SLOT, RaffleDocument } from '../schemas/raffle.schema';

@Injectable()
export class MongoRaffleRepository implements IRaffleRepository {
  constructor(
    @InjectModel(RaffleDocument.name)
    private readonly raffleModel: Model<RaffleDocument>,
  ) {}

  async load(): Promise<Raffle> {
    const doc = await this.raffleModel.findOne({ slot: CURRENT_RAFFLE_SLOT }).exec();
    return doc ? this.toEntity(doc) : Raffle.initial();
  }

  async save(raffle: Raffle): Promise<Raffle> {
    const doc = await this.raffleModel
      .findOneAndUpdate(
        { slot: CURRENT_RAFFLE_SLOT },
        {
          owner: raffle.owner,
          previousOwner: raffle.previousOwner,
          entranceFee: raffle.entranceFee.toString(),
          state: raffle.state,
          players: raffle.players,
          previousSessionPlayers: raffle.previousSessionPlayers,
          recentWinner: raffle.recentWinner,
          pendingRequestId: raffle.pendingRequestId?.toString() ?? null,
        },
        { new: true, upsert: true, setDefaultsOnInsert: true },
      )
      .exec();
    if (!doc) {
      throw new Error('Upsert of the raffle returned no document');
    }
    return this.toEntity(doc);
  }

  private toEntity(doc: RaffleDocument): Raffle {
    return new Raffle({
      id: doc._id.toString(),
      owner: doc.owner,
      previousOwner: doc.previousOwner,
      entranceFee: BigInt(doc.entranceFee),
      state: doc.state,
      players: doc.players,
      previousSessionPlayers: doc.previousSessionPlayers,
      recentWinner: doc.recentWinner,
      pendingRequestId: doc.pendingRequestId === null ? null : BigInt(doc.pendingRequestId),
      createdAt: doc.createdAt || new Date(),
      updatedAt: doc.updatedAt || new Date(),
    });
  }
}

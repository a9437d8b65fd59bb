import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { LedgerAccount } from '../../domain/ledger-account.entity';
import { ILedgerRepository } from '../../domain/ledger.repository';
import { LedgerAccountDocument } from '../schemas/ledger-account.schema';

@Injectable()
export class MongoLedgerRepository implements ILedgerRepository {
  constructor(
    @InjectModel(LedgerAccountDocument.name)
    private readonly accountModel: Model<LedgerAccountDocument>,
  ) {}

  async findByAddress(address: string): Promise<LedgerAccount | null> {
    const doc = await this.accountModel.findOne({ address }).exec();
    return doc ? this.toEntity(doc) : null;
  }

  async save(account: LedgerAccount): Promise<LedgerAccount> {
    const doc = await this.accountModel
      .findOneAndUpdate(
        { address: account.address },
        {
          address: account.address,
          balance: account.balance.toString(),
          rejectsTransfers: account.rejectsTransfers,
        },
        { new: true, upsert: true },
      )
      .exec();
    if (!doc) {
      throw new Error(`Upsert of ledger account ${account.address} returned no document`);
    }
    return this.toEntity(doc);
  }

  private toEntity(doc: LedgerAccountDocument): LedgerAccount {
    return new LedgerAccount({
      id: doc._id.toString(),
      address: doc.address,
      balance: BigInt(doc.balance),
      rejectsTransfers: doc.rejectsTransfers,
      createdAt: doc.createdAt || new Date(),
      updatedAt: doc.updatedAt || new Date(),
    });
  }
}

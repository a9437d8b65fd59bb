import { Schema, Prop, SchemaFactory } from '@nestjs/mongoose';
import { Document, Types } from 'mongoose';

@Schema({ collection: 'ledger_accounts', timestamps: true })
export class LedgerAccountDocument extends Document<Types.ObjectId> {
  @Prop({ required: true, unique: true })
  address!: string;

  // Decimal wei string; bigint does not round-trip through BSON numbers.
  @Prop({ required: true, default: '0' })
  balance!: string;

  @Prop({ required: true, default: false })
  rejectsTransfers!: boolean;

  createdAt?: Date;
  updatedAt?: Date;
}

export const LedgerAccountSchema = SchemaFactory.createForClass(LedgerAccountDocument);

import { Schema, Prop, SchemaFactory } from '@nestjs/mongoose';
import { Document, Types } from 'mongoose';
import { RaffleState } from '../../domain/raffle.entity';

/** The one document this collection holds */
export const CURRENT_RAFFLE_SLOT = 'current';

@Schema({ collection: 'raffles', timestamps: true })
export class RaffleDocument extends Document<Types.ObjectId> {
  @Prop({ required: true, unique: true, default: CURRENT_RAFFLE_SLOT })
  slot!: string;

  @Prop({ type: String, default: null })
  owner!: string | null;

  @Prop({ type: String, default: null })
  previousOwner!: string | null;

  // Wei amounts and request ids are decimal strings.
  @Prop({ required: true, default: '0' })
  entranceFee!: string;

  @Prop({ required: true, enum: Object.values(RaffleState), default: RaffleState.CLOSED })
  state!: RaffleState;

  @Prop({ type: [String], default: [] })
  players!: string[];

  @Prop({ type: [String], default: [] })
  previousSessionPlayers!: string[];

  @Prop({ type: String, default: null })
  recentWinner!: string | null;

  @Prop({ type: String, default: null })
  pendingRequestId!: string | null;

  createdAt?: Date;
  updatedAt?: Date;
}

export const RaffleSchema = SchemaFactory.createForClass(RaffleDocument);

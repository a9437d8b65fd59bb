import { Schema, Prop, SchemaFactory } from '@nestjs/mongoose';
import { Document, Types } from 'mongoose';

const EVENT_NAMES = ['RaffleOpened', 'RaffleEntered', 'RequestedRaffleWinner', 'RaffleWinnerPicked'];

@Schema({ collection: 'raffle_events' })
export class RaffleEventDocument extends Document<Types.ObjectId> {
  @Prop({ required: true, unique: true })
  sequence!: number;

  @Prop({ required: true, enum: EVENT_NAMES })
  name!: string;

  @Prop({ type: Map, of: String, default: {} })
  args!: Map<string, string>;

  @Prop({ required: true })
  emittedAt!: Date;
}

export const RaffleEventSchema = SchemaFactory.createForClass(RaffleEventDocument);

RaffleEventSchema.index({ name: 1, sequence: 1 });

import { RaffleEventName } from '../../domain/raffle-event';

export interface RaffleEventResponseDto {
  sequence: number;
  name: RaffleEventName;
  args: Record<string, string>;
  emittedAt: string;
}

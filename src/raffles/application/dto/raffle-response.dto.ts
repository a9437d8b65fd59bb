import { RaffleState } from '../../domain/raffle.entity';

export interface RaffleResponseDto {
  owner: string | null;
  previousOwner: string | null;
  entranceFee: string;
  state: RaffleState;
  players: string[];
  playersCount: number;
  previousSessionPlayers: string[];
  recentWinner: string | null;
  pendingRequestId: string | null;
  updatedAt: string;
}

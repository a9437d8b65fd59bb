import { IsString, Matches } from 'class-validator';

export class OpenRaffleDto {
  /** Entrance fee in wei */
  @IsString()
  @Matches(/^\d+$/, { message: 'fee must be an unsigned integer amount in wei' })
  fee!: string;
}

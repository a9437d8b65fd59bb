import { IsString, Matches } from 'class-validator';

export class EnterRaffleDto {
  /** Value attached to the entry, in wei */
  @IsString()
  @Matches(/^\d+$/, { message: 'payment must be an unsigned integer amount in wei' })
  payment!: string;
}

import { IsBoolean } from 'class-validator';

export class UpdateRejectsTransfersDto {
  @IsBoolean()
  rejectsTransfers!: boolean;
}

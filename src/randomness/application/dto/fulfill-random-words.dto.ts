import { ArrayNotEmpty, IsArray, IsOptional, Matches } from 'class-validator';

export class FulfillRandomWordsDto {
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @Matches(/^\d+$/, { each: true, message: 'each random word must be an unsigned integer' })
  randomWords?: string[];
}

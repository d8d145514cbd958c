import { IsString, IsOptional, MaxLength } from 'class-validator';

export class TransitionBookingDto {
  @IsString()
  @IsOptional()
  @MaxLength(500)
  reason?: string;
}

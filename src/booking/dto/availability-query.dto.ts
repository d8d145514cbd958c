import { IsNotEmpty, IsDateString } from 'class-validator';

export class AvailabilityQueryDto {
  @IsDateString()
  @IsNotEmpty()
  start!: string;

  @IsDateString()
  @IsNotEmpty()
  end!: string;
}

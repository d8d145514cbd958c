import {
  IsString,
  IsNotEmpty,
  IsDateString,
  IsOptional,
  IsUUID,
  IsInt,
  IsPositive,
  MaxLength,
} from 'class-validator';

export class CreateBookingDto {
  @IsUUID()
  resourceId!: string;

  @IsDateString()
  @IsNotEmpty()
  startTime!: string;

  @IsDateString()
  @IsNotEmpty()
  endTime!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  title!: string;

  @IsString()
  @IsOptional()
  description?: string;

  @IsString()
  @IsOptional()
  @MaxLength(300)
  purpose?: string;

  @IsInt()
  @IsPositive()
  @IsOptional()
  attendees?: number;

  @IsString()
  @IsOptional()
  @MaxLength(255)
  contactInfo?: string;

  @IsString()
  @IsOptional()
  specialRequirements?: string;

  // e.g. RRULE:FREQ=WEEKLY;COUNT=10
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  recurrenceRule?: string;
}

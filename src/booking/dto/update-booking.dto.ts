import {
  IsString,
  IsNotEmpty,
  IsDateString,
  IsOptional,
  IsInt,
  IsPositive,
  MaxLength,
} from 'class-validator';

/**
 * Partial update of a booking. `null` clears an optional detail.
 */
export class UpdateBookingDto {
  @IsDateString()
  @IsOptional()
  startTime?: string;

  @IsDateString()
  @IsOptional()
  endTime?: string;

  @IsString()
  @IsNotEmpty()
  @IsOptional()
  @MaxLength(200)
  title?: string;

  @IsString()
  @IsOptional()
  description?: string | null;

  @IsString()
  @IsOptional()
  @MaxLength(300)
  purpose?: string | null;

  @IsInt()
  @IsPositive()
  @IsOptional()
  attendees?: number | null;

  @IsString()
  @IsOptional()
  @MaxLength(255)
  contactInfo?: string | null;

  @IsString()
  @IsOptional()
  specialRequirements?: string | null;
}

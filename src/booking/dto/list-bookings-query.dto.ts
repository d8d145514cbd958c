import { IsDateString, IsEnum, IsOptional, IsString, IsUUID } from 'class-validator';
import { BookingStatus } from '../entities/booking.entity';

export class ListBookingsQueryDto {
  @IsUUID()
  @IsOptional()
  resourceId?: string;

  @IsString()
  @IsOptional()
  requesterId?: string;

  @IsEnum(BookingStatus)
  @IsOptional()
  status?: BookingStatus;

  @IsDateString()
  @IsOptional()
  from?: string;

  @IsDateString()
  @IsOptional()
  to?: string;
}

export class ResourceBookingsQueryDto {
  @IsEnum(BookingStatus)
  @IsOptional()
  status?: BookingStatus;
}

import {
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Query,
  UseGuards,
} from '@nestjs/common';
import { RequireCapability } from '../auth/auth.decorators';
import { PrincipalGuard } from '../auth/principal.guard';
import { ResourceRegistryService } from '../resource/services/resource-registry.service';
import { AvailabilityQueryDto } from './dto/availability-query.dto';
import { AvailabilityResponseDto } from './dto/availability-response.dto';
import {
  BookingResponseDto,
  toBookingResponse,
} from './dto/booking-response.dto';
import { ResourceBookingsQueryDto } from './dto/list-bookings-query.dto';
import { AvailabilityService } from './services/availability.service';
import { BookingLedgerService } from './services/booking-ledger.service';

@Controller('resources/:resourceId')
@UseGuards(PrincipalGuard)
export class ResourceBookingsController {
  constructor(
    private readonly ledger: BookingLedgerService,
    private readonly availability: AvailabilityService,
    private readonly registry: ResourceRegistryService,
  ) {}

  @Get('availability')
  @RequireCapability('booking:read')
  async getAvailability(
    @Param('resourceId', ParseUUIDPipe) resourceId: string,
    @Query() query: AvailabilityQueryDto,
  ): Promise<AvailabilityResponseDto> {
    const range = { start: new Date(query.start), end: new Date(query.end) };

    const segments = await this.availability.freeBusyIntervals(
      resourceId,
      range.start,
      range.end,
    );
    const resource = await this.registry.getResource(resourceId);

    return {
      resourceId,
      start: range.start.toISOString(),
      end: range.end.toISOString(),
      bookable: this.registry.isBookable(resource),
      free: await this.availability.isFree(resourceId, range),
      segments: segments.map((segment) => ({
        start: segment.interval.start.toISOString(),
        end: segment.interval.end.toISOString(),
        busy: segment.busy,
      })),
    };
  }

  @Get('bookings')
  @RequireCapability('booking:read')
  async listBookings(
    @Param('resourceId', ParseUUIDPipe) resourceId: string,
    @Query() query: ResourceBookingsQueryDto,
  ): Promise<BookingResponseDto[]> {
    const bookings = await this.ledger.listForResource(
      resourceId,
      query.status ? [query.status] : undefined,
    );
    return bookings.map(toBookingResponse);
  }
}

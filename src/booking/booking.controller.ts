import {
  Controller,
  Post,
  Body,
  HttpCode,
  HttpStatus,
  Query,
  Get,
  Param,
  Patch,
  ParseUUIDPipe,
  ConflictException,
  UseGuards,
} from '@nestjs/common';
import { RequireCapability, CurrentPrincipal } from '../auth/auth.decorators';
import { AuthorizationService } from '../auth/authorization.service';
import { Principal } from '../auth/principal';
import { PrincipalGuard } from '../auth/principal.guard';
import { BookingConflictError } from '../common/errors/booking.errors';
import { toErrorBody } from '../common/filters/booking-exception.filter';
import { CreateBookingDto } from './dto/create-booking.dto';
import { ListBookingsQueryDto } from './dto/list-bookings-query.dto';
import { TransitionBookingDto } from './dto/transition-booking.dto';
import { UpdateBookingDto } from './dto/update-booking.dto';
import {
  BookingConflictResponseDto,
  BookingResponseDto,
  CreateBookingResponseDto,
  toBookingResponse,
  toTimeSlot,
} from './dto/booking-response.dto';
import { Booking } from './entities/booking.entity';
import { AvailabilityService } from './services/availability.service';
import {
  BookingLedgerService,
  BookingStats,
} from './services/booking-ledger.service';
import { BookingWorkflowService } from './services/booking-workflow.service';
import { durationMs, TimeInterval } from './utils/time-interval';

@Controller('bookings')
@UseGuards(PrincipalGuard)
export class BookingController {
  constructor(
    private readonly ledger: BookingLedgerService,
    private readonly workflow: BookingWorkflowService,
    private readonly availability: AvailabilityService,
    private readonly authorizationService: AuthorizationService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @RequireCapability('booking:create')
  async createBooking(
    @Body() createBookingDto: CreateBookingDto,
    @CurrentPrincipal() principal: Principal,
  ): Promise<CreateBookingResponseDto> {
    const interval = {
      start: new Date(createBookingDto.startTime),
      end: new Date(createBookingDto.endTime),
    };
    const metadata = {
      title: createBookingDto.title,
      description: createBookingDto.description,
      purpose: createBookingDto.purpose,
      attendees: createBookingDto.attendees,
      contactInfo: createBookingDto.contactInfo,
      specialRequirements: createBookingDto.specialRequirements,
    };

    let bookings: Booking[];
    try {
      bookings = createBookingDto.recurrenceRule
        ? await this.ledger.createRecurring(
            createBookingDto.resourceId,
            principal.userId,
            interval,
            createBookingDto.recurrenceRule,
            metadata,
          )
        : [
            await this.ledger.create(
              createBookingDto.resourceId,
              principal.userId,
              interval,
              metadata,
            ),
          ];
    } catch (error) {
      if (error instanceof BookingConflictError) {
        throw new ConflictException(
          await this.conflictResponse(error, interval),
        );
      }
      throw error;
    }

    return {
      bookings: bookings.map(toBookingResponse),
      seriesId: bookings[0]?.series_id ?? null,
      message:
        bookings.length > 1
          ? `Recurring booking created with ${bookings.length} occurrences`
          : 'Booking created successfully',
    };
  }

  @Get()
  @RequireCapability('booking:read')
  async listBookings(
    @Query() query: ListBookingsQueryDto,
  ): Promise<BookingResponseDto[]> {
    const bookings = await this.ledger.list({
      resourceId: query.resourceId,
      requesterId: query.requesterId,
      statuses: query.status ? [query.status] : undefined,
      endsAfter: query.from ? new Date(query.from) : undefined,
      startsBefore: query.to ? new Date(query.to) : undefined,
    });
    return bookings.map(toBookingResponse);
  }

  @Get('stats')
  @RequireCapability('booking:read')
  async getStats(): Promise<BookingStats> {
    return await this.ledger.stats();
  }

  @Get(':id')
  @RequireCapability('booking:read')
  async getBooking(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<BookingResponseDto> {
    return toBookingResponse(await this.ledger.get(id));
  }

  @Patch(':id')
  @RequireCapability('booking:create')
  async updateBooking(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateBookingDto,
    @CurrentPrincipal() principal: Principal,
  ): Promise<BookingResponseDto> {
    const actor = this.authorizationService.toBookingActor(principal);
    const start = dto.startTime ? new Date(dto.startTime) : undefined;
    const end = dto.endTime ? new Date(dto.endTime) : undefined;

    try {
      const booking = await this.ledger.update(id, actor, {
        start,
        end,
        title: dto.title ?? undefined,
        description: dto.description,
        purpose: dto.purpose,
        attendees: dto.attendees,
        contactInfo: dto.contactInfo,
        specialRequirements: dto.specialRequirements,
      });
      return toBookingResponse(booking);
    } catch (error) {
      if (error instanceof BookingConflictError && start && end) {
        throw new ConflictException(
          await this.conflictResponse(error, { start, end }),
        );
      }
      throw error;
    }
  }

  @Post(':id/approve')
  @HttpCode(HttpStatus.OK)
  @RequireCapability('booking:approve')
  async approve(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentPrincipal() principal: Principal,
  ): Promise<BookingResponseDto> {
    const actor = this.authorizationService.toBookingActor(principal);
    return toBookingResponse(await this.workflow.approve(id, actor));
  }

  @Post(':id/reject')
  @HttpCode(HttpStatus.OK)
  @RequireCapability('booking:approve')
  async reject(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: TransitionBookingDto,
    @CurrentPrincipal() principal: Principal,
  ): Promise<BookingResponseDto> {
    const actor = this.authorizationService.toBookingActor(principal);
    return toBookingResponse(await this.workflow.reject(id, actor, dto.reason));
  }

  @Post(':id/confirm')
  @HttpCode(HttpStatus.OK)
  @RequireCapability('booking:approve')
  async confirm(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentPrincipal() principal: Principal,
  ): Promise<BookingResponseDto> {
    const actor = this.authorizationService.toBookingActor(principal);
    return toBookingResponse(await this.workflow.confirm(id, actor));
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @RequireCapability('booking:create')
  async cancel(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: TransitionBookingDto,
    @CurrentPrincipal() principal: Principal,
  ): Promise<BookingResponseDto> {
    const actor = this.authorizationService.toBookingActor(principal);
    return toBookingResponse(await this.ledger.cancel(id, actor, dto.reason));
  }

  private async conflictResponse(
    error: BookingConflictError,
    interval: TimeInterval,
  ): Promise<BookingConflictResponseDto> {
    const slots = await this.availability.nextAvailableSlots(
      error.resourceId,
      interval.start,
      durationMs(interval),
    );

    return {
      ...toErrorBody(error),
      hasConflict: true,
      conflicts: error.conflicts.map((conflict) => ({
        bookingId: conflict.id,
        startTime: conflict.start_time.toISOString(),
        endTime: conflict.end_time.toISOString(),
      })),
      nextAvailableSlots: slots.map(toTimeSlot),
    };
  }
}

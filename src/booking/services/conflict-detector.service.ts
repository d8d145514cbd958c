import { Injectable } from '@nestjs/common';
import {
  ACTIVE_BOOKING_STATUSES,
  Booking,
  isActiveStatus,
} from '../entities/booking.entity';
import { BookingRepository } from '../repositories/booking.repository';
import { isOverlapping, TimeInterval } from '../utils/time-interval';

@Injectable()
export class ConflictDetectorService {
  constructor(private readonly bookingRepository: BookingRepository) {}

  /**
   * Check whether the interval overlaps any active booking of the resource.
   * Pass the repository handed out by `withResourceLock` to run the check
   * inside that lock.
   */
  async hasConflict(
    resourceId: string,
    interval: TimeInterval,
    excludeBookingId?: string,
    repository: BookingRepository = this.bookingRepository,
  ): Promise<boolean> {
    const candidates = await this.activeBookingsAround(
      resourceId,
      interval,
      repository,
    );

    return candidates.some((booking) =>
      this.conflictsWith(booking, interval, excludeBookingId),
    );
  }

  /**
   * Find every active booking of the resource overlapping the interval,
   * ordered by start time.
   */
  async findConflicts(
    resourceId: string,
    interval: TimeInterval,
    excludeBookingId?: string,
    repository: BookingRepository = this.bookingRepository,
  ): Promise<Booking[]> {
    const candidates = await this.activeBookingsAround(
      resourceId,
      interval,
      repository,
    );

    return candidates.filter((booking) =>
      this.conflictsWith(booking, interval, excludeBookingId),
    );
  }

  private async activeBookingsAround(
    resourceId: string,
    interval: TimeInterval,
    repository: BookingRepository,
  ): Promise<Booking[]> {
    return await repository.findByResourceAndStatus(
      resourceId,
      ACTIVE_BOOKING_STATUSES,
      interval,
    );
  }

  // Stores narrow by status and window as well; the predicate is authoritative
  private conflictsWith(
    booking: Booking,
    interval: TimeInterval,
    excludeBookingId?: string,
  ): boolean {
    return (
      booking.id !== excludeBookingId &&
      isActiveStatus(booking.status) &&
      isOverlapping(
        { start: booking.start_time, end: booking.end_time },
        interval,
      )
    );
  }
}

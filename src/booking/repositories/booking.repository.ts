import { Booking, BookingStatus } from '../entities/booking.entity';
import { TimeInterval } from '../utils/time-interval';

export interface BookingFilter {
  resourceId?: string;
  requesterId?: string;
  statuses?: readonly BookingStatus[];
  /** end_time > endsAfter */
  endsAfter?: Date;
  /** start_time < startsBefore */
  startsBefore?: Date;
  /** start_time <= startingBy */
  startingBy?: Date;
  /** end_time <= endingBy */
  endingBy?: Date;
}

/**
 * Storage port for bookings. Implementations order every list by start time
 * ascending.
 */
export abstract class BookingRepository {
  abstract findById(id: string): Promise<Booking | null>;

  /**
   * Bookings of one resource, optionally narrowed to some statuses and to
   * those intersecting a window.
   */
  abstract findByResourceAndStatus(
    resourceId: string,
    statuses?: readonly BookingStatus[],
    window?: TimeInterval,
  ): Promise<Booking[]>;

  abstract findAll(filter: BookingFilter): Promise<Booking[]>;

  abstract save(booking: Booking): Promise<Booking>;

  abstract saveMany(bookings: Booking[]): Promise<Booking[]>;

  /**
   * Runs `work` while holding the exclusive lock of one resource. Reads and
   * writes that must be atomic with each other go through the repository
   * handed to `work`.
   */
  abstract withResourceLock<T>(
    resourceId: string,
    work: (repository: BookingRepository) => Promise<T>,
  ): Promise<T>;
}

import { KeyedMutex } from '../../common/keyed-mutex';
import { Booking, BookingStatus } from '../entities/booking.entity';
import { TimeInterval } from '../utils/time-interval';
import { BookingFilter, BookingRepository } from './booking.repository';

const copyDate = (date: Date): Date => new Date(date.getTime());

function copyBooking(booking: Booking): Booking {
  return {
    ...booking,
    start_time: copyDate(booking.start_time),
    end_time: copyDate(booking.end_time),
    approved_at: booking.approved_at ? copyDate(booking.approved_at) : null,
    created_at: copyDate(booking.created_at),
    updated_at: copyDate(booking.updated_at),
  };
}

/**
 * Map-backed booking store with a per-resource mutex. Records are copied on
 * the way in and out so callers never hold live references.
 */
export class InMemoryBookingRepository extends BookingRepository {
  constructor(
    private readonly bookings: Map<string, Booking> = new Map(),
    private readonly mutex: KeyedMutex = new KeyedMutex(),
    private readonly heldLocks: ReadonlySet<string> = new Set(),
  ) {
    super();
  }

  async findById(id: string): Promise<Booking | null> {
    const booking = this.bookings.get(id);
    return booking ? copyBooking(booking) : null;
  }

  async findByResourceAndStatus(
    resourceId: string,
    statuses?: readonly BookingStatus[],
    window?: TimeInterval,
  ): Promise<Booking[]> {
    return this.findAll({
      resourceId,
      statuses,
      endsAfter: window?.start,
      startsBefore: window?.end,
    });
  }

  async findAll(filter: BookingFilter): Promise<Booking[]> {
    const matches = Array.from(this.bookings.values()).filter(
      (booking) =>
        (!filter.resourceId || booking.resource_id === filter.resourceId) &&
        (!filter.requesterId || booking.requester_id === filter.requesterId) &&
        (!filter.statuses || filter.statuses.includes(booking.status)) &&
        (!filter.startingBy || booking.start_time <= filter.startingBy) &&
        (!filter.endingBy || booking.end_time <= filter.endingBy) &&
        (!filter.endsAfter || booking.end_time > filter.endsAfter) &&
        (!filter.startsBefore || booking.start_time < filter.startsBefore),
    );

    return matches
      .sort((a, b) => a.start_time.getTime() - b.start_time.getTime())
      .map(copyBooking);
  }

  async save(booking: Booking): Promise<Booking> {
    this.bookings.set(booking.id, copyBooking(booking));
    return copyBooking(booking);
  }

  async saveMany(bookings: Booking[]): Promise<Booking[]> {
    for (const booking of bookings) {
      this.bookings.set(booking.id, copyBooking(booking));
    }
    return bookings.map(copyBooking);
  }

  async withResourceLock<T>(
    resourceId: string,
    work: (repository: BookingRepository) => Promise<T>,
  ): Promise<T> {
    if (this.heldLocks.has(resourceId)) {
      return await work(this);
    }

    return await this.mutex.runExclusive(resourceId, () =>
      work(
        new InMemoryBookingRepository(
          this.bookings,
          this.mutex,
          new Set([...this.heldLocks, resourceId]),
        ),
      ),
    );
  }
}

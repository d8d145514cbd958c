import { Inject, Injectable } from '@nestjs/common';
import { InvalidIntervalError } from '../../common/errors/booking.errors';
import { BOOKING_CONFIG, BookingConfig } from '../../config/booking.config';
import { ResourceRegistryService } from '../../resource/services/resource-registry.service';
import { ACTIVE_BOOKING_STATUSES } from '../entities/booking.entity';
import { BookingRepository } from '../repositories/booking.repository';
import {
  assertValidInterval,
  durationMs,
  FreeBusySegment,
  freeBusySegments,
  TimeInterval,
} from '../utils/time-interval';
import { ConflictDetectorService } from './conflict-detector.service';

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class AvailabilityService {
  constructor(
    private readonly bookingRepository: BookingRepository,
    private readonly registry: ResourceRegistryService,
    private readonly conflictDetector: ConflictDetectorService,
    @Inject(BOOKING_CONFIG) private readonly config: BookingConfig,
  ) {}

  async isFree(resourceId: string, interval: TimeInterval): Promise<boolean> {
    assertValidInterval(interval);
    const resource = await this.registry.getResource(resourceId);
    if (!this.registry.isBookable(resource)) {
      return false;
    }
    return !(await this.conflictDetector.hasConflict(resourceId, interval));
  }

  /**
   * Free and busy segments of a resource over [rangeStart, rangeEnd),
   * ordered by start.
   */
  async freeBusyIntervals(
    resourceId: string,
    rangeStart: Date,
    rangeEnd: Date,
  ): Promise<FreeBusySegment[]> {
    const range = { start: rangeStart, end: rangeEnd };
    assertValidInterval(range);
    await this.registry.getResource(resourceId);

    const bookings = await this.bookingRepository.findByResourceAndStatus(
      resourceId,
      ACTIVE_BOOKING_STATUSES,
      range,
    );

    return freeBusySegments(
      range,
      bookings.map((booking) => ({
        start: booking.start_time,
        end: booking.end_time,
      })),
    );
  }

  /**
   * Suggest slots of `duration` ms, at most one per free gap, searching from
   * `from` (or now, whichever is later) up to the suggestion horizon.
   */
  async nextAvailableSlots(
    resourceId: string,
    from: Date,
    duration: number,
    maxSlots: number = this.config.maxSuggestions,
  ): Promise<TimeInterval[]> {
    const searchStart = new Date(Math.max(from.getTime(), Date.now()));
    if (!(duration > 0)) {
      throw new InvalidIntervalError(
        searchStart,
        new Date(searchStart.getTime() + duration),
        'duration must be positive',
      );
    }

    const resource = await this.registry.getResource(resourceId);
    if (!this.registry.isBookable(resource)) {
      return [];
    }

    const searchEnd = new Date(
      searchStart.getTime() + this.config.suggestionHorizonDays * DAY_MS,
    );
    const segments = await this.freeBusyIntervals(
      resourceId,
      searchStart,
      searchEnd,
    );

    return segments
      .filter((segment) => !segment.busy && durationMs(segment.interval) >= duration)
      .slice(0, maxSlots)
      .map((segment) => ({
        start: segment.interval.start,
        end: new Date(segment.interval.start.getTime() + duration),
      }));
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  BookingConflictError,
  BookingNotEditableError,
  InvalidIntervalError,
  NotFoundError,
  UnauthorizedError,
} from '../../common/errors/booking.errors';
import { Resource } from '../../resource/entities/resource.entity';
import { ResourceRegistryService } from '../../resource/services/resource-registry.service';
import { actorLabel, BookingActor } from '../booking-actor';
import { Booking, BookingStatus } from '../entities/booking.entity';
import {
  BookingFilter,
  BookingRepository,
} from '../repositories/booking.repository';
import {
  assertValidInterval,
  isOverlapping,
  TimeInterval,
} from '../utils/time-interval';
import { BookingNotificationDispatcher } from './booking-notifier';
import { BookingWorkflowService } from './booking-workflow.service';
import { ConflictDetectorService } from './conflict-detector.service';
import { RecurrenceService } from './recurrence.service';

/**
 * Caller-supplied details stored with a booking; the engine does not
 * interpret them.
 */
export interface BookingMetadata {
  title: string;
  description?: string;
  purpose?: string;
  attendees?: number;
  contactInfo?: string;
  specialRequirements?: string;
}

/**
 * Changes to an existing booking. Omitted fields keep their value; `null`
 * clears an optional detail.
 */
export interface BookingChanges {
  start?: Date;
  end?: Date;
  title?: string;
  description?: string | null;
  purpose?: string | null;
  attendees?: number | null;
  contactInfo?: string | null;
  specialRequirements?: string | null;
}

export interface BookingStats {
  total: number;
  pending: number;
  approved: number;
  today: number;
  resources: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const EDITABLE_STATUSES: readonly BookingStatus[] = [
  BookingStatus.PENDING,
  BookingStatus.APPROVED,
];

const copyDate = (date: Date): Date => new Date(date.getTime());

const OCCUPYING_STATUSES: readonly BookingStatus[] = [
  BookingStatus.APPROVED,
  BookingStatus.CONFIRMED,
  BookingStatus.IN_USE,
];

@Injectable()
export class BookingLedgerService {
  private readonly logger = new Logger(BookingLedgerService.name);

  constructor(
    private readonly bookingRepository: BookingRepository,
    private readonly registry: ResourceRegistryService,
    private readonly conflictDetector: ConflictDetectorService,
    private readonly recurrenceService: RecurrenceService,
    private readonly workflow: BookingWorkflowService,
    private readonly notifications: BookingNotificationDispatcher,
  ) {}

  /**
   * Create a PENDING booking. The conflict check and the insert run under
   * the resource lock, so overlapping requests racing each other cannot both
   * succeed.
   */
  async create(
    resourceId: string,
    requesterId: string,
    interval: TimeInterval,
    metadata: BookingMetadata,
  ): Promise<Booking> {
    assertValidInterval(interval);
    await this.assertResourceBookable(resourceId);

    const booking = await this.bookingRepository.withResourceLock(
      resourceId,
      async (repository) => {
        await this.assertResourceBookable(resourceId);
        const conflicts = await this.conflictDetector.findConflicts(
          resourceId,
          interval,
          undefined,
          repository,
        );
        if (conflicts.length > 0) {
          throw new BookingConflictError(resourceId, conflicts);
        }

        return await repository.save(
          this.createBookingEntity(resourceId, requesterId, interval, metadata),
        );
      },
    );

    this.logger.log(
      `Booking ${booking.id} created for resource ${resourceId} by ${requesterId}`,
    );
    this.notifications.dispatch('booking.created', booking, requesterId);

    return booking;
  }

  /**
   * Create every occurrence of a recurring request, or none of them.
   */
  async createRecurring(
    resourceId: string,
    requesterId: string,
    interval: TimeInterval,
    recurrenceRule: string,
    metadata: BookingMetadata,
  ): Promise<Booking[]> {
    assertValidInterval(interval);
    await this.assertResourceBookable(resourceId);

    const occurrences = this.recurrenceService.expand(recurrenceRule, interval);
    for (let i = 1; i < occurrences.length; i++) {
      if (isOverlapping(occurrences[i - 1], occurrences[i])) {
        throw new InvalidIntervalError(
          occurrences[i].start,
          occurrences[i].end,
          'Recurring occurrences overlap each other',
        );
      }
    }

    const seriesId = uuidv4();
    const bookings = await this.bookingRepository.withResourceLock(
      resourceId,
      async (repository) => {
        await this.assertResourceBookable(resourceId);
        const conflicts: Booking[] = [];
        for (const occurrence of occurrences) {
          conflicts.push(
            ...(await this.conflictDetector.findConflicts(
              resourceId,
              occurrence,
              undefined,
              repository,
            )),
          );
        }

        if (conflicts.length > 0) {
          const unique = Array.from(
            new Map(conflicts.map((booking) => [booking.id, booking])).values(),
          );
          throw new BookingConflictError(resourceId, unique);
        }

        return await repository.saveMany(
          occurrences.map((occurrence) =>
            this.createBookingEntity(
              resourceId,
              requesterId,
              occurrence,
              metadata,
              seriesId,
            ),
          ),
        );
      },
    );

    this.logger.log(
      `Recurring booking ${seriesId} created with ${bookings.length} occurrences on resource ${resourceId}`,
    );
    for (const booking of bookings) {
      this.notifications.dispatch('booking.created', booking, requesterId);
    }

    return bookings;
  }

  async get(bookingId: string): Promise<Booking> {
    const booking = await this.bookingRepository.findById(bookingId);
    if (!booking) {
      throw new NotFoundError('booking', bookingId);
    }
    return booking;
  }

  async listForResource(
    resourceId: string,
    statusFilter?: readonly BookingStatus[],
  ): Promise<Booking[]> {
    await this.registry.getResource(resourceId);
    return await this.bookingRepository.findByResourceAndStatus(
      resourceId,
      statusFilter,
    );
  }

  async list(filter: BookingFilter): Promise<Booking[]> {
    return await this.bookingRepository.findAll(filter);
  }

  async cancel(
    bookingId: string,
    actor: BookingActor,
    reason?: string,
  ): Promise<Booking> {
    return await this.workflow.cancel(bookingId, actor, reason);
  }

  /**
   * Move a booking or change its details. Allowed to the requester and to
   * approvers of the resource's category while the booking is PENDING or
   * APPROVED and has not started. The status is left as it is.
   */
  async update(
    bookingId: string,
    actor: BookingActor,
    changes: BookingChanges,
  ): Promise<Booking> {
    const current = await this.get(bookingId);

    const updated = await this.bookingRepository.withResourceLock(
      current.resource_id,
      async (repository) => {
        const booking = await repository.findById(bookingId);
        if (!booking) {
          throw new NotFoundError('booking', bookingId);
        }

        const resource = await this.registry.getResource(booking.resource_id);
        if (!this.mayEdit(actor, booking, resource)) {
          throw new UnauthorizedError(
            actorLabel(actor),
            `change booking ${bookingId}`,
          );
        }
        if (!EDITABLE_STATUSES.includes(booking.status)) {
          throw new BookingNotEditableError(
            bookingId,
            booking.status,
            'only PENDING or APPROVED bookings can be changed',
          );
        }
        const now = new Date();
        if (now >= booking.start_time) {
          throw new BookingNotEditableError(
            bookingId,
            booking.status,
            'booking has already started',
          );
        }

        const interval = {
          start: changes.start ?? booking.start_time,
          end: changes.end ?? booking.end_time,
        };
        assertValidInterval(interval);

        if (changes.start || changes.end) {
          this.registry.assertBookable(resource);
          const conflicts = await this.conflictDetector.findConflicts(
            booking.resource_id,
            interval,
            bookingId,
            repository,
          );
          if (conflicts.length > 0) {
            throw new BookingConflictError(booking.resource_id, conflicts);
          }
        }

        return await repository.save({
          ...booking,
          start_time: copyDate(interval.start),
          end_time: copyDate(interval.end),
          title: changes.title ?? booking.title,
          description:
            changes.description !== undefined
              ? changes.description
              : booking.description,
          purpose: changes.purpose !== undefined ? changes.purpose : booking.purpose,
          attendees:
            changes.attendees !== undefined ? changes.attendees : booking.attendees,
          contact_info:
            changes.contactInfo !== undefined
              ? changes.contactInfo
              : booking.contact_info,
          special_requirements:
            changes.specialRequirements !== undefined
              ? changes.specialRequirements
              : booking.special_requirements,
          updated_at: now,
        });
      },
    );

    this.logger.log(`Booking ${bookingId} changed by ${actorLabel(actor)}`);
    if (changes.start || changes.end) {
      this.notifications.dispatch(
        'booking.rescheduled',
        updated,
        actorLabel(actor),
      );
    }

    return updated;
  }

  /**
   * Dashboard counters. `today` is the current UTC day.
   */
  async stats(now: Date = new Date()): Promise<BookingStats> {
    const bookings = await this.bookingRepository.findAll({});
    const dayStart = new Date(
      Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()),
    );
    const dayEnd = new Date(dayStart.getTime() + DAY_MS);

    return {
      total: bookings.length,
      pending: bookings.filter((b) => b.status === BookingStatus.PENDING).length,
      approved: bookings.filter((b) => b.status === BookingStatus.APPROVED)
        .length,
      today: bookings.filter(
        (b) =>
          OCCUPYING_STATUSES.includes(b.status) &&
          b.start_time >= dayStart &&
          b.start_time < dayEnd,
      ).length,
      resources: await this.registry.countResources(),
    };
  }

  private async assertResourceBookable(resourceId: string): Promise<void> {
    this.registry.assertBookable(await this.registry.getResource(resourceId));
  }

  private mayEdit(
    actor: BookingActor,
    booking: Booking,
    resource: Resource,
  ): boolean {
    return (
      actor.kind === 'user' &&
      (actor.userId === booking.requester_id ||
        actor.approvableCategories.has(resource.category))
    );
  }

  private createBookingEntity(
    resourceId: string,
    requesterId: string,
    interval: TimeInterval,
    metadata: BookingMetadata,
    seriesId?: string,
  ): Booking {
    const now = new Date();
    return {
      id: uuidv4(),
      resource_id: resourceId,
      requester_id: requesterId,
      start_time: copyDate(interval.start),
      end_time: copyDate(interval.end),
      status: BookingStatus.PENDING,
      title: metadata.title,
      description: metadata.description ?? null,
      purpose: metadata.purpose ?? null,
      attendees: metadata.attendees ?? null,
      contact_info: metadata.contactInfo ?? null,
      special_requirements: metadata.specialRequirements ?? null,
      approver_id: null,
      approved_at: null,
      status_reason: null,
      series_id: seriesId ?? null,
      created_at: now,
      updated_at: now,
    };
  }
}

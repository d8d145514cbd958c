import { Injectable, Logger } from '@nestjs/common';
import {
  BookingConflictError,
  InvalidTransitionError,
  NotFoundError,
  UnauthorizedError,
} from '../../common/errors/booking.errors';
import { Resource } from '../../resource/entities/resource.entity';
import { ResourceRegistryService } from '../../resource/services/resource-registry.service';
import { actorLabel, BookingActor, SYSTEM_ACTOR } from '../booking-actor';
import {
  findTransitionRule,
  isTerminalStatus,
  TransitionRule,
  TransitionTrigger,
} from '../booking-transitions';
import { Booking, BookingStatus } from '../entities/booking.entity';
import { BookingRepository } from '../repositories/booking.repository';
import {
  BookingEventType,
  BookingNotificationDispatcher,
} from './booking-notifier';
import { ConflictDetectorService } from './conflict-detector.service';

const NOTIFIED_TRANSITIONS: Partial<Record<BookingStatus, BookingEventType>> = {
  [BookingStatus.APPROVED]: 'booking.approved',
  [BookingStatus.REJECTED]: 'booking.rejected',
  [BookingStatus.CANCELLED]: 'booking.cancelled',
};

/**
 * The only writer of `Booking.status`. Each transition re-reads the booking
 * under the resource lock, checks the edge, the actor and the guard, and
 * writes the new status in the same critical section.
 */
@Injectable()
export class BookingWorkflowService {
  private readonly logger = new Logger(BookingWorkflowService.name);

  constructor(
    private readonly bookingRepository: BookingRepository,
    private readonly registry: ResourceRegistryService,
    private readonly conflictDetector: ConflictDetectorService,
    private readonly notifications: BookingNotificationDispatcher,
  ) {}

  async transition(
    bookingId: string,
    to: BookingStatus,
    actor: BookingActor,
    reason?: string,
  ): Promise<Booking> {
    const current = await this.bookingRepository.findById(bookingId);
    if (!current) {
      throw new NotFoundError('booking', bookingId);
    }
    const resource = await this.registry.getResource(current.resource_id);

    const { previous, updated } = await this.bookingRepository.withResourceLock(
      current.resource_id,
      async (repository) => {
        const booking = await repository.findById(bookingId);
        if (!booking) {
          throw new NotFoundError('booking', bookingId);
        }

        const rule = findTransitionRule(booking.status, to);
        if (!rule) {
          throw new InvalidTransitionError(
            bookingId,
            booking.status,
            to,
            isTerminalStatus(booking.status)
              ? `${booking.status} is a final status`
              : undefined,
          );
        }
        if (!this.mayTrigger(actor, rule, booking, resource)) {
          throw new UnauthorizedError(
            actorLabel(actor),
            `move booking ${bookingId} from ${booking.status} to ${to}`,
          );
        }

        const now = new Date();
        await this.checkGuard(rule, booking, now, repository);

        const next: Booking = { ...booking, status: to, updated_at: now };
        if (to === BookingStatus.APPROVED || to === BookingStatus.REJECTED) {
          next.approver_id = actorLabel(actor);
        }
        if (to === BookingStatus.APPROVED) {
          next.approved_at = now;
        }
        if (reason !== undefined) {
          next.status_reason = reason;
        }

        return {
          previous: booking.status,
          updated: await repository.save(next),
        };
      },
    );

    this.logger.log(
      `Booking ${bookingId} ${previous} -> ${to} by ${actorLabel(actor)}`,
    );

    const eventType = NOTIFIED_TRANSITIONS[to];
    if (eventType) {
      this.notifications.dispatch(eventType, updated, actorLabel(actor));
    }

    return updated;
  }

  async approve(bookingId: string, actor: BookingActor): Promise<Booking> {
    return await this.transition(bookingId, BookingStatus.APPROVED, actor);
  }

  async reject(
    bookingId: string,
    actor: BookingActor,
    reason?: string,
  ): Promise<Booking> {
    return await this.transition(bookingId, BookingStatus.REJECTED, actor, reason);
  }

  async confirm(bookingId: string, actor: BookingActor): Promise<Booking> {
    return await this.transition(bookingId, BookingStatus.CONFIRMED, actor);
  }

  async start(bookingId: string, actor: BookingActor = SYSTEM_ACTOR): Promise<Booking> {
    return await this.transition(bookingId, BookingStatus.IN_USE, actor);
  }

  async complete(
    bookingId: string,
    actor: BookingActor = SYSTEM_ACTOR,
  ): Promise<Booking> {
    return await this.transition(bookingId, BookingStatus.COMPLETED, actor);
  }

  async cancel(
    bookingId: string,
    actor: BookingActor,
    reason?: string,
  ): Promise<Booking> {
    return await this.transition(bookingId, BookingStatus.CANCELLED, actor, reason);
  }

  private mayTrigger(
    actor: BookingActor,
    rule: TransitionRule,
    booking: Booking,
    resource: Resource,
  ): boolean {
    const roles = new Set<TransitionTrigger>();

    if (actor.kind === 'system') {
      roles.add('system');
    } else {
      if (actor.userId === booking.requester_id) {
        roles.add('requester');
      }
      if (actor.approvableCategories.has(resource.category)) {
        roles.add('approver');
      }
    }

    return rule.triggers.some((trigger) => roles.has(trigger));
  }

  private async checkGuard(
    rule: TransitionRule,
    booking: Booking,
    now: Date,
    repository: BookingRepository,
  ): Promise<void> {
    const reject = (reason: string): never => {
      throw new InvalidTransitionError(booking.id, rule.from, rule.to, reason);
    };

    switch (rule.guard) {
      case 'none':
        return;
      case 'no-conflict': {
        const conflicts = await this.conflictDetector.findConflicts(
          booking.resource_id,
          { start: booking.start_time, end: booking.end_time },
          booking.id,
          repository,
        );
        if (conflicts.length > 0) {
          throw new BookingConflictError(booking.resource_id, conflicts);
        }
        return;
      }
      case 'not-started':
        if (now > booking.start_time) {
          reject('booking has already started');
        }
        return;
      case 'before-start':
        if (now >= booking.start_time) {
          reject('booking has already started');
        }
        return;
      case 'started':
        if (now < booking.start_time) {
          reject('booking has not started yet');
        }
        return;
      case 'ended':
        if (now < booking.end_time) {
          reject('booking has not ended yet');
        }
        return;
    }
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { Booking } from '../entities/booking.entity';

export type BookingEventType =
  | 'booking.created'
  | 'booking.rescheduled'
  | 'booking.approved'
  | 'booking.rejected'
  | 'booking.cancelled';

export interface BookingEvent {
  type: BookingEventType;
  booking: Booking;
  actorId: string;
  occurredAt: Date;
}

/**
 * Delivery channel for booking notifications (email, chat, push). Bind a
 * different implementation to this token to change the channel.
 */
export abstract class BookingNotifier {
  abstract notify(event: BookingEvent): Promise<void>;
}

@Injectable()
export class LoggingBookingNotifier extends BookingNotifier {
  private readonly logger = new Logger(LoggingBookingNotifier.name);

  async notify(event: BookingEvent): Promise<void> {
    this.logger.log(
      `${event.type} booking=${event.booking.id} requester=${event.booking.requester_id} actor=${event.actorId}`,
    );
  }
}

/**
 * Fire-and-forget front of the notifier: a failed delivery is logged and
 * never reaches the booking operation that triggered it.
 */
@Injectable()
export class BookingNotificationDispatcher {
  private readonly logger = new Logger(BookingNotificationDispatcher.name);

  constructor(private readonly notifier: BookingNotifier) {}

  dispatch(type: BookingEventType, booking: Booking, actorId: string): void {
    const event: BookingEvent = {
      type,
      booking,
      actorId,
      occurredAt: new Date(),
    };

    void Promise.resolve()
      .then(() => this.notifier.notify(event))
      .catch((error: unknown) => {
        this.logger.warn(
          `Failed to deliver ${type} for booking ${booking.id}: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      });
  }
}

export type BookingErrorKind =
  | 'NotFound'
  | 'InvalidInterval'
  | 'InvalidRecurrence'
  | 'ResourceUnavailable'
  | 'BookingConflict'
  | 'InvalidTransition'
  | 'NotEditable'
  | 'Unauthorized'
  | 'StoreUnavailable';

/**
 * Base class of every failure the booking engine reports to its callers.
 * `kind` is the stable discriminator; messages are for humans.
 */
export abstract class BookingDomainError extends Error {
  abstract readonly kind: BookingErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends BookingDomainError {
  readonly kind = 'NotFound';

  constructor(
    readonly entity: 'resource' | 'booking',
    readonly id: string,
  ) {
    super(`${entity === 'resource' ? 'Resource' : 'Booking'} ${id} not found`);
  }
}

export class InvalidIntervalError extends BookingDomainError {
  readonly kind = 'InvalidInterval';

  constructor(
    readonly start: Date,
    readonly end: Date,
    message = 'start_time must be before end_time',
  ) {
    super(message);
  }
}

export class InvalidRecurrenceError extends BookingDomainError {
  readonly kind = 'InvalidRecurrence';

  constructor(
    readonly rule: string,
    reason: string,
  ) {
    super(`Invalid recurrence rule "${rule}": ${reason}`);
  }
}

export class ResourceUnavailableError extends BookingDomainError {
  readonly kind = 'ResourceUnavailable';

  constructor(
    readonly resourceId: string,
    readonly status: string,
  ) {
    super(`Resource ${resourceId} is ${status} and accepts no new bookings`);
  }
}

export class BookingConflictError extends BookingDomainError {
  readonly kind = 'BookingConflict';

  constructor(
    readonly resourceId: string,
    readonly conflicts: ReadonlyArray<{ id: string; start_time: Date; end_time: Date }>,
  ) {
    super('Booking conflicts with existing bookings');
  }
}

export class InvalidTransitionError extends BookingDomainError {
  readonly kind = 'InvalidTransition';

  constructor(
    readonly bookingId: string,
    readonly from: string,
    readonly to: string,
    reason?: string,
  ) {
    super(
      `Cannot move booking ${bookingId} from ${from} to ${to}` +
        (reason ? `: ${reason}` : ''),
    );
  }
}

export class BookingNotEditableError extends BookingDomainError {
  readonly kind = 'NotEditable';

  constructor(
    readonly bookingId: string,
    readonly status: string,
    reason: string,
  ) {
    super(`Booking ${bookingId} (${status}) cannot be changed: ${reason}`);
  }
}

export class UnauthorizedError extends BookingDomainError {
  readonly kind = 'Unauthorized';

  constructor(
    readonly actorId: string,
    readonly action: string,
  ) {
    super(`${actorId} is not allowed to ${action}`);
  }
}

export class StoreUnavailableError extends BookingDomainError {
  readonly kind = 'StoreUnavailable';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

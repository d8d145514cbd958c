import { allowedTransitions } from '../booking-transitions';
import { Booking, BookingStatus } from '../entities/booking.entity';
import { TimeInterval } from '../utils/time-interval';

export class BookingResponseDto {
  id!: string;
  resourceId!: string;
  requesterId!: string;
  startTime!: string;
  endTime!: string;
  status!: BookingStatus;
  approverId!: string | null;
  title!: string;
  description!: string | null;
  purpose!: string | null;
  attendees!: number | null;
  contactInfo!: string | null;
  specialRequirements!: string | null;
  seriesId!: string | null;
  statusReason!: string | null;
  /** Statuses the booking may move to next. */
  allowedTransitions!: BookingStatus[];
  createdAt!: string;
  updatedAt!: string;
}

export class CreateBookingResponseDto {
  bookings!: BookingResponseDto[];
  seriesId!: string | null;
  message!: string;
}

export class ConflictInfo {
  bookingId!: string;
  startTime!: string;
  endTime!: string;
}

export class TimeSlot {
  startTime!: string;
  endTime!: string;
}

export class BookingConflictResponseDto {
  statusCode!: number;
  error!: string;
  hasConflict!: true;
  conflicts!: ConflictInfo[];
  nextAvailableSlots!: TimeSlot[];
  message!: string;
}

export const toBookingResponse = (booking: Booking): BookingResponseDto => ({
  id: booking.id,
  resourceId: booking.resource_id,
  requesterId: booking.requester_id,
  startTime: booking.start_time.toISOString(),
  endTime: booking.end_time.toISOString(),
  status: booking.status,
  approverId: booking.approver_id,
  title: booking.title,
  description: booking.description,
  purpose: booking.purpose,
  attendees: booking.attendees,
  contactInfo: booking.contact_info,
  specialRequirements: booking.special_requirements,
  seriesId: booking.series_id,
  statusReason: booking.status_reason,
  allowedTransitions: allowedTransitions(booking.status),
  createdAt: booking.created_at.toISOString(),
  updatedAt: booking.updated_at.toISOString(),
});

export const toTimeSlot = (interval: TimeInterval): TimeSlot => ({
  startTime: interval.start.toISOString(),
  endTime: interval.end.toISOString(),
});

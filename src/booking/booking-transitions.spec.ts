import {
  allowedTransitions,
  findTransitionRule,
  isTerminalStatus,
} from './booking-transitions';
import { BookingStatus } from './entities/booking.entity';

describe('booking transitions', () => {
  it('should list the legal next statuses', () => {
    expect(allowedTransitions(BookingStatus.PENDING)).toEqual([
      BookingStatus.APPROVED,
      BookingStatus.REJECTED,
      BookingStatus.CANCELLED,
    ]);
    expect(allowedTransitions(BookingStatus.APPROVED)).toEqual([
      BookingStatus.CONFIRMED,
      BookingStatus.CANCELLED,
    ]);
    expect(allowedTransitions(BookingStatus.CONFIRMED)).toEqual([
      BookingStatus.IN_USE,
      BookingStatus.CANCELLED,
    ]);
    expect(allowedTransitions(BookingStatus.IN_USE)).toEqual([
      BookingStatus.COMPLETED,
    ]);
  });

  it('should treat rejected, completed and cancelled as terminal', () => {
    expect(isTerminalStatus(BookingStatus.REJECTED)).toBe(true);
    expect(isTerminalStatus(BookingStatus.COMPLETED)).toBe(true);
    expect(isTerminalStatus(BookingStatus.CANCELLED)).toBe(true);
    expect(isTerminalStatus(BookingStatus.IN_USE)).toBe(false);
  });

  it('should reserve the time-driven edges for the system', () => {
    expect(
      findTransitionRule(BookingStatus.CONFIRMED, BookingStatus.IN_USE)?.triggers,
    ).toEqual(['system']);
    expect(
      findTransitionRule(BookingStatus.IN_USE, BookingStatus.COMPLETED)?.triggers,
    ).toEqual(['system']);
  });

  it('should not allow moving back to PENDING', () => {
    expect(
      findTransitionRule(BookingStatus.APPROVED, BookingStatus.PENDING),
    ).toBeUndefined();
  });
});

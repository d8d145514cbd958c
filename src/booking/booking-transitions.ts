import { BookingStatus } from './entities/booking.entity';

export type TransitionTrigger = 'requester' | 'approver' | 'system';

/**
 * - `no-conflict`: re-run the conflict check, excluding the booking itself
 * - `not-started`: now <= start
 * - `before-start`: now < start
 * - `started`: now >= start
 * - `ended`: now >= end
 */
export type TransitionGuard =
  | 'none'
  | 'no-conflict'
  | 'not-started'
  | 'before-start'
  | 'started'
  | 'ended';

export interface TransitionRule {
  from: BookingStatus;
  to: BookingStatus;
  triggers: readonly TransitionTrigger[];
  guard: TransitionGuard;
}

export const TRANSITION_RULES: readonly TransitionRule[] = [
  {
    from: BookingStatus.PENDING,
    to: BookingStatus.APPROVED,
    triggers: ['approver'],
    guard: 'no-conflict',
  },
  {
    from: BookingStatus.PENDING,
    to: BookingStatus.REJECTED,
    triggers: ['approver'],
    guard: 'none',
  },
  {
    from: BookingStatus.PENDING,
    to: BookingStatus.CANCELLED,
    triggers: ['requester', 'approver'],
    guard: 'none',
  },
  {
    from: BookingStatus.APPROVED,
    to: BookingStatus.CONFIRMED,
    triggers: ['approver', 'system'],
    guard: 'not-started',
  },
  {
    from: BookingStatus.APPROVED,
    to: BookingStatus.CANCELLED,
    triggers: ['requester', 'approver'],
    guard: 'before-start',
  },
  {
    from: BookingStatus.CONFIRMED,
    to: BookingStatus.IN_USE,
    triggers: ['system'],
    guard: 'started',
  },
  {
    from: BookingStatus.CONFIRMED,
    to: BookingStatus.CANCELLED,
    triggers: ['requester', 'approver'],
    guard: 'before-start',
  },
  {
    from: BookingStatus.IN_USE,
    to: BookingStatus.COMPLETED,
    triggers: ['system'],
    guard: 'ended',
  },
];

export const findTransitionRule = (
  from: BookingStatus,
  to: BookingStatus,
): TransitionRule | undefined =>
  TRANSITION_RULES.find((rule) => rule.from === from && rule.to === to);

export const allowedTransitions = (from: BookingStatus): BookingStatus[] =>
  TRANSITION_RULES.filter((rule) => rule.from === from).map((rule) => rule.to);

export const isTerminalStatus = (status: BookingStatus): boolean =>
  allowedTransitions(status).length === 0;

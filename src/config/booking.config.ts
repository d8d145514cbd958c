export const BOOKING_CONFIG = Symbol('BOOKING_CONFIG');

export interface BookingConfig {
  /** How often the lifecycle sweep runs. */
  sweepIntervalMs: number;
  sweepEnabled: boolean;
  /** Upper bound on the occurrences a single recurring request may create. */
  maxOccurrences: number;
  /** Rules without COUNT are expanded no further than this. */
  recurrenceHorizonDays: number;
  suggestionHorizonDays: number;
  maxSuggestions: number;
  /** Postgres `lock_timeout` for the per-resource row lock. */
  lockTimeoutMs: number;
}

const intFromEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const bookingConfig: BookingConfig = {
  sweepIntervalMs: intFromEnv('BOOKING_SWEEP_INTERVAL_MS', 5 * 60 * 1000),
  sweepEnabled: process.env.BOOKING_SWEEP_ENABLED !== 'false',
  maxOccurrences: intFromEnv('BOOKING_MAX_OCCURRENCES', 100),
  recurrenceHorizonDays: intFromEnv('BOOKING_RECURRENCE_HORIZON_DAYS', 365),
  suggestionHorizonDays: intFromEnv('BOOKING_SUGGESTION_HORIZON_DAYS', 90),
  maxSuggestions: intFromEnv('BOOKING_SUGGESTION_MAX', 5),
  lockTimeoutMs: intFromEnv('BOOKING_LOCK_TIMEOUT_MS', 5000),
};

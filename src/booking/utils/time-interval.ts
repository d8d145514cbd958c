import { InvalidIntervalError } from '../../common/errors/booking.errors';

/**
 * Half-open time interval [start, end).
 */
export interface TimeInterval {
  start: Date;
  end: Date;
}

export const isValidInterval = (interval: TimeInterval): boolean =>
  !Number.isNaN(interval.start.getTime()) &&
  !Number.isNaN(interval.end.getTime()) &&
  interval.start < interval.end;

export function assertValidInterval(interval: TimeInterval): void {
  if (!isValidInterval(interval)) {
    throw new InvalidIntervalError(interval.start, interval.end);
  }
}

/**
 * Two half-open intervals overlap iff each starts before the other ends,
 * so back-to-back intervals never overlap.
 */
export function isOverlapping(a: TimeInterval, b: TimeInterval): boolean {
  return a.start < b.end && b.start < a.end;
}

export function durationMs(interval: TimeInterval): number {
  return interval.end.getTime() - interval.start.getTime();
}

export function sortByStart<T extends TimeInterval>(intervals: T[]): T[] {
  return [...intervals].sort((a, b) => a.start.getTime() - b.start.getTime());
}

/**
 * Merge overlapping or touching intervals. Input order does not matter.
 */
export function coalesce(intervals: TimeInterval[]): TimeInterval[] {
  const merged: TimeInterval[] = [];

  for (const interval of sortByStart(intervals)) {
    const last = merged[merged.length - 1];
    if (last && interval.start <= last.end) {
      if (interval.end > last.end) {
        last.end = interval.end;
      }
      continue;
    }
    merged.push({ start: interval.start, end: interval.end });
  }

  return merged;
}

export function clip(interval: TimeInterval, window: TimeInterval): TimeInterval {
  return {
    start: interval.start < window.start ? window.start : interval.start,
    end: interval.end > window.end ? window.end : interval.end,
  };
}

export interface FreeBusySegment {
  interval: TimeInterval;
  busy: boolean;
}

/**
 * Split `range` into alternating busy and free segments. Busy intervals are
 * clipped to the range and coalesced first, so the output never holds two
 * adjacent segments with the same flag.
 */
export function freeBusySegments(
  range: TimeInterval,
  busy: TimeInterval[],
): FreeBusySegment[] {
  const merged = coalesce(
    busy
      .filter((interval) => isOverlapping(interval, range))
      .map((interval) => clip(interval, range)),
  );

  const segments: FreeBusySegment[] = [];
  let cursor = range.start;

  for (const interval of merged) {
    if (interval.start > cursor) {
      segments.push({ interval: { start: cursor, end: interval.start }, busy: false });
    }
    segments.push({ interval, busy: true });
    cursor = interval.end;
  }

  if (cursor < range.end) {
    segments.push({ interval: { start: cursor, end: range.end }, busy: false });
  }

  return segments;
}

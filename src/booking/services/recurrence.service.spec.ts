import { Test, TestingModule } from '@nestjs/testing';
import { InvalidRecurrenceError } from '../../common/errors/booking.errors';
import { BOOKING_CONFIG } from '../../config/booking.config';
import { interval, testConfig } from '../../testing/fixtures';
import { RecurrenceService } from './recurrence.service';

describe('RecurrenceService', () => {
  let service: RecurrenceService;
  const first = interval('2025-01-06T09:00:00Z', '2025-01-06T10:00:00Z');

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RecurrenceService,
        { provide: BOOKING_CONFIG, useValue: testConfig },
      ],
    }).compile();

    service = module.get<RecurrenceService>(RecurrenceService);
  });

  const starts = (rule: string) =>
    service.expand(rule, first).map((occurrence) => occurrence.start.toISOString());

  describe('expand', () => {
    it('should expand daily recurrence with COUNT', () => {
      expect(starts('RRULE:FREQ=DAILY;COUNT=5')).toEqual([
        '2025-01-06T09:00:00.000Z',
        '2025-01-07T09:00:00.000Z',
        '2025-01-08T09:00:00.000Z',
        '2025-01-09T09:00:00.000Z',
        '2025-01-10T09:00:00.000Z',
      ]);
    });

    it('should expand weekly recurrence with COUNT', () => {
      expect(starts('RRULE:FREQ=WEEKLY;COUNT=3')).toEqual([
        '2025-01-06T09:00:00.000Z',
        '2025-01-13T09:00:00.000Z',
        '2025-01-20T09:00:00.000Z',
      ]);
    });

    it('should expand monthly recurrence with COUNT', () => {
      expect(starts('RRULE:FREQ=MONTHLY;COUNT=3')).toEqual([
        '2025-01-06T09:00:00.000Z',
        '2025-02-06T09:00:00.000Z',
        '2025-03-06T09:00:00.000Z',
      ]);
    });

    it('should expand yearly recurrence with COUNT', () => {
      expect(starts('RRULE:FREQ=YEARLY;COUNT=3')).toEqual([
        '2025-01-06T09:00:00.000Z',
        '2026-01-06T09:00:00.000Z',
        '2027-01-06T09:00:00.000Z',
      ]);
    });

    it('should honour INTERVAL', () => {
      expect(starts('RRULE:FREQ=WEEKLY;INTERVAL=2;COUNT=3')).toEqual([
        '2025-01-06T09:00:00.000Z',
        '2025-01-20T09:00:00.000Z',
        '2025-02-03T09:00:00.000Z',
      ]);
    });

    it('should keep the duration of the first occurrence', () => {
      const occurrences = service.expand('RRULE:FREQ=DAILY;COUNT=2', first);

      expect(occurrences[1].end.toISOString()).toBe('2025-01-07T10:00:00.000Z');
    });

    it('should stop at UNTIL inclusively', () => {
      expect(starts('RRULE:FREQ=WEEKLY;UNTIL=20250120T090000Z')).toEqual([
        '2025-01-06T09:00:00.000Z',
        '2025-01-13T09:00:00.000Z',
        '2025-01-20T09:00:00.000Z',
      ]);
    });

    it('should stop an open-ended rule at the recurrence horizon', () => {
      const occurrences = starts('RRULE:FREQ=WEEKLY');

      expect(occurrences).toHaveLength(53);
      expect(occurrences[52]).toBe('2026-01-05T09:00:00.000Z');
    });

    it('should handle case-insensitive RRULE prefix', () => {
      expect(starts('rrule:FREQ=WEEKLY;COUNT=3')).toHaveLength(3);
    });

    it('should accept a rule without the RRULE prefix', () => {
      expect(starts('FREQ=DAILY;COUNT=2')).toHaveLength(2);
    });
  });

  describe('invalid rules', () => {
    it('should reject a malformed rule', () => {
      expect(() => service.expand('INVALID_RRULE', first)).toThrow(
        'Invalid recurrence rule "INVALID_RRULE": malformed part "INVALID_RRULE"',
      );
    });

    it('should reject a rule without FREQ', () => {
      expect(() => service.expand('RRULE:COUNT=10', first)).toThrow(
        'FREQ parameter is required',
      );
    });

    it('should reject unsupported frequencies', () => {
      expect(() => service.expand('RRULE:FREQ=HOURLY;COUNT=2', first)).toThrow(
        'unsupported frequency HOURLY',
      );
    });

    it('should reject unsupported parameters', () => {
      expect(() =>
        service.expand('RRULE:FREQ=WEEKLY;BYDAY=MO;COUNT=2', first),
      ).toThrow('unsupported parameter BYDAY');
    });

    it('should reject a non-positive COUNT', () => {
      expect(() => service.expand('RRULE:FREQ=DAILY;COUNT=0', first)).toThrow(
        'COUNT must be a positive integer',
      );
    });

    it('should reject COUNT combined with UNTIL', () => {
      expect(() =>
        service.expand('RRULE:FREQ=DAILY;COUNT=2;UNTIL=20250110T000000Z', first),
      ).toThrow('COUNT and UNTIL cannot be combined');
    });

    it('should reject COUNT above the occurrence limit', () => {
      expect(() => service.expand('RRULE:FREQ=DAILY;COUNT=101', first)).toThrow(
        'COUNT exceeds the limit of 100',
      );
    });

    it('should reject an open-ended rule that expands past the limit', () => {
      expect(() => service.expand('RRULE:FREQ=DAILY', first)).toThrow(
        'rule expands to more than 100 occurrences',
      );
    });

    it('should reject an UNTIL before the first occurrence', () => {
      expect(() =>
        service.expand('RRULE:FREQ=DAILY;UNTIL=20250101T000000Z', first),
      ).toThrow('rule generated no occurrences');
    });

    it('should throw InvalidRecurrenceError', () => {
      expect(() => service.expand('RRULE:FREQ=NEVER', first)).toThrow(
        InvalidRecurrenceError,
      );
    });
  });
});

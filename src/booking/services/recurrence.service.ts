import { Inject, Injectable } from '@nestjs/common';
import { RRule, Frequency } from 'rrule';
import type { Options } from 'rrule';
import { InvalidRecurrenceError } from '../../common/errors/booking.errors';
import { BOOKING_CONFIG, BookingConfig } from '../../config/booking.config';
import { durationMs, TimeInterval } from '../utils/time-interval';

export interface RecurrenceConfig {
  freq: Frequency;
  count?: number;
  interval?: number;
  until?: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class RecurrenceService {
  constructor(@Inject(BOOKING_CONFIG) private readonly config: BookingConfig) {}

  /**
   * Expand a rule such as `RRULE:FREQ=WEEKLY;COUNT=10` into the occurrences
   * of `first`, each keeping its duration. Rules without COUNT stop at the
   * recurrence horizon.
   */
  expand(rruleString: string, first: TimeInterval): TimeInterval[] {
    const params = this.parseRRuleParams(rruleString);

    if (params.count !== undefined && params.count > this.config.maxOccurrences) {
      throw new InvalidRecurrenceError(
        rruleString,
        `COUNT exceeds the limit of ${this.config.maxOccurrences}`,
      );
    }

    const options: Partial<Options> = {
      freq: params.freq,
      dtstart: first.start,
    };
    if (params.count !== undefined) {
      options.count = params.count;
    }
    if (params.until) {
      options.until = params.until;
    }
    if (params.interval) {
      options.interval = params.interval;
    }

    const rule = new RRule(options);
    const starts =
      params.count !== undefined
        ? rule.all()
        : rule.between(
            first.start,
            new Date(
              first.start.getTime() + this.config.recurrenceHorizonDays * DAY_MS,
            ),
            true,
          );

    if (starts.length === 0) {
      throw new InvalidRecurrenceError(rruleString, 'rule generated no occurrences');
    }
    if (starts.length > this.config.maxOccurrences) {
      throw new InvalidRecurrenceError(
        rruleString,
        `rule expands to more than ${this.config.maxOccurrences} occurrences`,
      );
    }

    const length = durationMs(first);
    return starts.map((start) => ({
      start,
      end: new Date(start.getTime() + length),
    }));
  }

  private parseRRuleParams(rruleString: string): RecurrenceConfig {
    const ruleStr = rruleString.trim().replace(/^RRULE:/i, '');
    let freq: Frequency | undefined;
    const params: Omit<RecurrenceConfig, 'freq'> = {};

    for (const part of ruleStr.split(';')) {
      if (part === '') {
        continue;
      }
      const [key, value] = part.split('=');
      if (value === undefined || value === '') {
        throw new InvalidRecurrenceError(rruleString, `malformed part "${part}"`);
      }

      switch (key.toUpperCase()) {
        case 'FREQ':
          freq = this.mapFrequency(rruleString, value);
          break;
        case 'COUNT':
          params.count = this.parsePositiveInt(rruleString, 'COUNT', value);
          break;
        case 'INTERVAL':
          params.interval = this.parsePositiveInt(rruleString, 'INTERVAL', value);
          break;
        case 'UNTIL':
          params.until = this.parseUntil(rruleString, value);
          break;
        default:
          throw new InvalidRecurrenceError(
            rruleString,
            `unsupported parameter ${key}`,
          );
      }
    }

    if (freq === undefined) {
      throw new InvalidRecurrenceError(rruleString, 'FREQ parameter is required');
    }
    if (params.count !== undefined && params.until !== undefined) {
      throw new InvalidRecurrenceError(
        rruleString,
        'COUNT and UNTIL cannot be combined',
      );
    }

    return { freq, ...params };
  }

  private mapFrequency(rruleString: string, freq: string): Frequency {
    switch (freq.toUpperCase()) {
      case 'DAILY':
        return RRule.DAILY;
      case 'WEEKLY':
        return RRule.WEEKLY;
      case 'MONTHLY':
        return RRule.MONTHLY;
      case 'YEARLY':
        return RRule.YEARLY;
      default:
        throw new InvalidRecurrenceError(
          rruleString,
          `unsupported frequency ${freq}`,
        );
    }
  }

  private parsePositiveInt(rruleString: string, name: string, value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new InvalidRecurrenceError(
        rruleString,
        `${name} must be a positive integer`,
      );
    }
    return parsed;
  }

  // Accepts the RFC 5545 basic form (20250106T090000Z) and ISO-8601
  private parseUntil(rruleString: string, value: string): Date {
    const basic = /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(\d{2})Z?)?$/.exec(value);
    const until = basic
      ? new Date(
          Date.UTC(
            Number(basic[1]),
            Number(basic[2]) - 1,
            Number(basic[3]),
            Number(basic[4] ?? '23'),
            Number(basic[5] ?? '59'),
            Number(basic[6] ?? '59'),
          ),
        )
      : new Date(value);

    if (Number.isNaN(until.getTime())) {
      throw new InvalidRecurrenceError(rruleString, `invalid UNTIL ${value}`);
    }
    return until;
  }
}

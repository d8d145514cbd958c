import { BookingActor } from '../booking/booking-actor';
import { Booking, BookingStatus } from '../booking/entities/booking.entity';
import { BookingConfig } from '../config/booking.config';
import {
  Resource,
  ResourceCategory,
  ResourceStatus,
} from '../resource/entities/resource.entity';

export const ROOM_ID = '6f1c2a4e-0b7d-4c1e-9a55-1d2f3e4a5b01';
export const LAPTOP_ID = '6f1c2a4e-0b7d-4c1e-9a55-1d2f3e4a5b02';

export const testConfig: BookingConfig = {
  sweepIntervalMs: 60_000,
  sweepEnabled: false,
  maxOccurrences: 100,
  recurrenceHorizonDays: 365,
  suggestionHorizonDays: 7,
  maxSuggestions: 3,
  lockTimeoutMs: 1000,
};

const CREATED_AT = new Date('2025-01-01T00:00:00Z');

export function makeResource(overrides: Partial<Resource> = {}): Resource {
  return {
    id: ROOM_ID,
    name: 'Room 1',
    category: ResourceCategory.MEETING_ROOM,
    capacity: 8,
    status: ResourceStatus.AVAILABLE,
    location: null,
    description: null,
    created_at: CREATED_AT,
    updated_at: CREATED_AT,
    ...overrides,
  };
}

export function makeBooking(overrides: Partial<Booking> = {}): Booking {
  return {
    id: 'b-1',
    resource_id: ROOM_ID,
    requester_id: 'user-a',
    start_time: new Date('2025-01-06T10:00:00Z'),
    end_time: new Date('2025-01-06T11:00:00Z'),
    status: BookingStatus.PENDING,
    title: 'Standup',
    description: null,
    purpose: null,
    attendees: null,
    contact_info: null,
    special_requirements: null,
    approver_id: null,
    approved_at: null,
    status_reason: null,
    series_id: null,
    created_at: CREATED_AT,
    updated_at: CREATED_AT,
    ...overrides,
  };
}

export const userActor = (
  userId: string,
  approvableCategories: ResourceCategory[] = [],
): BookingActor => ({
  kind: 'user',
  userId,
  approvableCategories: new Set(approvableCategories),
});

export const interval = (start: string, end: string) => ({
  start: new Date(start),
  end: new Date(end),
});

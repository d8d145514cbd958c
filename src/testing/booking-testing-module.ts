import { Test, TestingModule } from '@nestjs/testing';
import { BookingRepository } from '../booking/repositories/booking.repository';
import { InMemoryBookingRepository } from '../booking/repositories/in-memory-booking.repository';
import { AvailabilityService } from '../booking/services/availability.service';
import { BookingLedgerService } from '../booking/services/booking-ledger.service';
import { BookingLifecycleScheduler } from '../booking/services/booking-lifecycle.scheduler';
import {
  BookingEvent,
  BookingNotificationDispatcher,
  BookingNotifier,
} from '../booking/services/booking-notifier';
import { BookingWorkflowService } from '../booking/services/booking-workflow.service';
import { ConflictDetectorService } from '../booking/services/conflict-detector.service';
import { RecurrenceService } from '../booking/services/recurrence.service';
import { BOOKING_CONFIG } from '../config/booking.config';
import { Resource } from '../resource/entities/resource.entity';
import { InMemoryResourceRepository } from '../resource/repositories/in-memory-resource.repository';
import { ResourceRepository } from '../resource/repositories/resource.repository';
import { ResourceRegistryService } from '../resource/services/resource-registry.service';
import { testConfig } from './fixtures';

export class RecordingNotifier extends BookingNotifier {
  readonly events: BookingEvent[] = [];

  async notify(event: BookingEvent): Promise<void> {
    this.events.push(event);
  }
}

export interface BookingTestContext {
  module: TestingModule;
  bookings: InMemoryBookingRepository;
  notifier: RecordingNotifier;
}

/**
 * The booking services wired against fresh in-memory stores.
 */
export async function createBookingTestingModule(
  resources: Resource[],
): Promise<BookingTestContext> {
  const bookings = new InMemoryBookingRepository();
  const notifier = new RecordingNotifier();

  const module = await Test.createTestingModule({
    providers: [
      { provide: BookingRepository, useValue: bookings },
      {
        provide: ResourceRepository,
        useValue: new InMemoryResourceRepository(resources),
      },
      { provide: BookingNotifier, useValue: notifier },
      { provide: BOOKING_CONFIG, useValue: testConfig },
      BookingNotificationDispatcher,
      ResourceRegistryService,
      ConflictDetectorService,
      RecurrenceService,
      BookingWorkflowService,
      BookingLedgerService,
      AvailabilityService,
      BookingLifecycleScheduler,
    ],
  }).compile();

  return { module, bookings, notifier };
}

/** Lets queued notification deliveries run; safe under fake timers. */
export async function flushNotifications(): Promise<void> {
  for (let i = 0; i < 5; i++) {
    await Promise.resolve();
  }
}

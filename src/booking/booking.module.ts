import { DynamicModule, Module, Provider } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { KeyedMutex } from '../common/keyed-mutex';
import { BOOKING_CONFIG, bookingConfig } from '../config/booking.config';
import { ResourceModule, ResourceModuleOptions } from '../resource/resource.module';
import { BookingController } from './booking.controller';
import { Booking } from './entities/booking.entity';
import { BookingRepository } from './repositories/booking.repository';
import { InMemoryBookingRepository } from './repositories/in-memory-booking.repository';
import { TypeOrmBookingRepository } from './repositories/typeorm-booking.repository';
import { ResourceBookingsController } from './resource-bookings.controller';
import { AvailabilityService } from './services/availability.service';
import { BookingLedgerService } from './services/booking-ledger.service';
import { BookingLifecycleScheduler } from './services/booking-lifecycle.scheduler';
import {
  BookingNotificationDispatcher,
  BookingNotifier,
  LoggingBookingNotifier,
} from './services/booking-notifier';
import { BookingWorkflowService } from './services/booking-workflow.service';
import { ConflictDetectorService } from './services/conflict-detector.service';
import { RecurrenceService } from './services/recurrence.service';

export type BookingModuleOptions = ResourceModuleOptions;

@Module({})
export class BookingModule {
  static register(options: BookingModuleOptions): DynamicModule {
    const repositoryProvider: Provider =
      options.store === 'postgres'
        ? { provide: BookingRepository, useClass: TypeOrmBookingRepository }
        : {
            provide: BookingRepository,
            useFactory: () =>
              new InMemoryBookingRepository(new Map(), new KeyedMutex()),
          };

    return {
      module: BookingModule,
      imports: [
        AuthModule,
        ResourceModule.register(options),
        ...(options.store === 'postgres'
          ? [TypeOrmModule.forFeature([Booking])]
          : []),
      ],
      controllers: [BookingController, ResourceBookingsController],
      providers: [
        repositoryProvider,
        { provide: BOOKING_CONFIG, useValue: bookingConfig },
        { provide: BookingNotifier, useClass: LoggingBookingNotifier },
        BookingNotificationDispatcher,
        ConflictDetectorService,
        RecurrenceService,
        BookingWorkflowService,
        BookingLedgerService,
        AvailabilityService,
        BookingLifecycleScheduler,
      ],
      exports: [BookingLedgerService, BookingWorkflowService, AvailabilityService],
    };
  }
}

import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { BOOKING_CONFIG, BookingConfig } from '../../config/booking.config';
import { SYSTEM_ACTOR } from '../booking-actor';
import { BookingStatus } from '../entities/booking.entity';
import { BookingRepository } from '../repositories/booking.repository';
import { BookingWorkflowService } from './booking-workflow.service';

export interface SweepResult {
  started: number;
  completed: number;
  failed: number;
}

/**
 * Periodic sweep for the time-driven transitions: CONFIRMED bookings whose
 * start has passed go IN_USE, IN_USE bookings whose end has passed go
 * COMPLETED.
 */
@Injectable()
export class BookingLifecycleScheduler
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(BookingLifecycleScheduler.name);
  private intervalId: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly bookingRepository: BookingRepository,
    private readonly workflow: BookingWorkflowService,
    @Inject(BOOKING_CONFIG) private readonly config: BookingConfig,
  ) {}

  onApplicationBootstrap(): void {
    if (!this.config.sweepEnabled) {
      this.logger.log('Booking lifecycle sweep disabled');
      return;
    }
    this.start();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  start(): void {
    if (this.intervalId) {
      this.logger.log('Booking lifecycle sweep already running');
      return;
    }

    this.logger.log(
      `Booking lifecycle sweep enabled (every ${this.config.sweepIntervalMs}ms)`,
    );
    this.intervalId = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.error(
          `Booking lifecycle sweep failed: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      });
    }, this.config.sweepIntervalMs);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      this.logger.log('Booking lifecycle sweep stopped');
    }
  }

  async sweep(): Promise<SweepResult> {
    const now = new Date();
    const result: SweepResult = { started: 0, completed: 0, failed: 0 };
    if (this.running) {
      return result;
    }
    this.running = true;

    try {
      const dueToStart = await this.bookingRepository.findAll({
        statuses: [BookingStatus.CONFIRMED],
        startingBy: now,
      });
      for (const booking of dueToStart) {
        if (await this.advance(booking.id, BookingStatus.IN_USE)) {
          result.started++;
        } else {
          result.failed++;
        }
      }

      // Runs after the first pass so a booking that started and ended
      // between two sweeps is completed in one run
      const dueToComplete = await this.bookingRepository.findAll({
        statuses: [BookingStatus.IN_USE],
        endingBy: now,
      });
      for (const booking of dueToComplete) {
        if (await this.advance(booking.id, BookingStatus.COMPLETED)) {
          result.completed++;
        } else {
          result.failed++;
        }
      }
    } finally {
      this.running = false;
    }

    if (result.started > 0 || result.completed > 0 || result.failed > 0) {
      this.logger.log(
        `Sweep: ${result.started} started, ${result.completed} completed, ${result.failed} failed`,
      );
    }
    return result;
  }

  private async advance(bookingId: string, to: BookingStatus): Promise<boolean> {
    try {
      await this.workflow.transition(bookingId, to, SYSTEM_ACTOR);
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to move booking ${bookingId} to ${to}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return false;
    }
  }
}

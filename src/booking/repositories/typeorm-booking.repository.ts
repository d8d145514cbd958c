import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  DataSource,
  EntityManager,
  QueryFailedError,
  QueryRunner,
  Repository,
} from 'typeorm';
import {
  BookingDomainError,
  StoreUnavailableError,
} from '../../common/errors/booking.errors';
import { BOOKING_CONFIG, BookingConfig } from '../../config/booking.config';
import { Resource } from '../../resource/entities/resource.entity';
import { Booking, BookingStatus } from '../entities/booking.entity';
import { TimeInterval } from '../utils/time-interval';
import { BookingFilter, BookingRepository } from './booking.repository';

// lock_not_available, serialization_failure, deadlock_detected,
// admin_shutdown and the connection exception class
const TRANSIENT_ERROR_CODES = new Set([
  '55P03',
  '40001',
  '40P01',
  '57P01',
  '08000',
  '08001',
  '08003',
  '08006',
  'ECONNREFUSED',
  'ECONNRESET',
]);

function errorCode(error: unknown): string | undefined {
  const source: unknown =
    error instanceof QueryFailedError ? error.driverError : error;
  if (
    typeof source === 'object' &&
    source !== null &&
    'code' in source &&
    typeof source.code === 'string'
  ) {
    return source.code;
  }
  return undefined;
}

@Injectable()
export class TypeOrmBookingRepository extends BookingRepository {
  private readonly logger = new Logger(TypeOrmBookingRepository.name);
  private transactional = false;

  constructor(
    @InjectRepository(Booking)
    private readonly bookingRepository: Repository<Booking>,
    private readonly dataSource: DataSource,
    @Inject(BOOKING_CONFIG)
    private readonly config: BookingConfig,
  ) {
    super();
  }

  async findById(id: string): Promise<Booking | null> {
    return await this.run(() =>
      this.bookingRepository.findOne({ where: { id } }),
    );
  }

  async findByResourceAndStatus(
    resourceId: string,
    statuses?: readonly BookingStatus[],
    window?: TimeInterval,
  ): Promise<Booking[]> {
    return await this.findAll({
      resourceId,
      statuses,
      endsAfter: window?.start,
      startsBefore: window?.end,
    });
  }

  async findAll(filter: BookingFilter): Promise<Booking[]> {
    if (filter.statuses && filter.statuses.length === 0) {
      return [];
    }

    const query = this.bookingRepository.createQueryBuilder('booking');

    if (filter.resourceId) {
      query.andWhere('booking.resource_id = :resourceId', {
        resourceId: filter.resourceId,
      });
    }
    if (filter.requesterId) {
      query.andWhere('booking.requester_id = :requesterId', {
        requesterId: filter.requesterId,
      });
    }
    if (filter.statuses) {
      query.andWhere('booking.status IN (:...statuses)', {
        statuses: [...filter.statuses],
      });
    }
    if (filter.startingBy) {
      query.andWhere('booking.start_time <= :startingBy', {
        startingBy: filter.startingBy,
      });
    }
    if (filter.endingBy) {
      query.andWhere('booking.end_time <= :endingBy', {
        endingBy: filter.endingBy,
      });
    }
    if (filter.endsAfter) {
      query.andWhere('booking.end_time > :endsAfter', {
        endsAfter: filter.endsAfter,
      });
    }
    if (filter.startsBefore) {
      query.andWhere('booking.start_time < :startsBefore', {
        startsBefore: filter.startsBefore,
      });
    }

    return await this.run(() =>
      query.orderBy('booking.start_time', 'ASC').getMany(),
    );
  }

  async save(booking: Booking): Promise<Booking> {
    return await this.run(() => this.bookingRepository.save(booking));
  }

  async saveMany(bookings: Booking[]): Promise<Booking[]> {
    return await this.run(() => this.bookingRepository.save(bookings));
  }

  /**
   * Opens a transaction and takes a row lock on the resource so that
   * conflict checks and writes for the same resource are serialized.
   */
  async withResourceLock<T>(
    resourceId: string,
    work: (repository: BookingRepository) => Promise<T>,
  ): Promise<T> {
    if (this.transactional) {
      await this.lockResourceRow(this.bookingRepository.manager, resourceId);
      return await work(this);
    }

    const queryRunner = this.dataSource.createQueryRunner();
    try {
      await queryRunner.connect();
      await queryRunner.startTransaction();
    } catch (error) {
      await queryRunner.release();
      throw this.translate(error);
    }

    try {
      await queryRunner.query(
        `SET LOCAL lock_timeout = '${this.config.lockTimeoutMs}ms'`,
      );
      await this.lockResourceRow(queryRunner.manager, resourceId);

      const result = await work(this.scoped(queryRunner.manager));

      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await this.rollback(queryRunner);
      throw this.translate(error);
    } finally {
      await queryRunner.release();
    }
  }

  private async rollback(queryRunner: QueryRunner): Promise<void> {
    try {
      await queryRunner.rollbackTransaction();
    } catch (rollbackError) {
      const message =
        rollbackError instanceof Error ? rollbackError.message : String(rollbackError);
      this.logger.warn(`Rollback failed: ${message}`);
    }
  }

  private async lockResourceRow(
    manager: EntityManager,
    resourceId: string,
  ): Promise<void> {
    await manager
      .getRepository(Resource)
      .createQueryBuilder('resource')
      .setLock('pessimistic_write')
      .where('resource.id = :resourceId', { resourceId })
      .getOne();
  }

  private scoped(manager: EntityManager): TypeOrmBookingRepository {
    const scoped = new TypeOrmBookingRepository(
      manager.getRepository(Booking),
      this.dataSource,
      this.config,
    );
    scoped.transactional = true;
    return scoped;
  }

  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw this.translate(error);
    }
  }

  private translate(error: unknown): unknown {
    if (error instanceof BookingDomainError) {
      return error;
    }

    const code = errorCode(error);
    if (code && TRANSIENT_ERROR_CODES.has(code)) {
      this.logger.warn(`Booking store unavailable (${code})`);
      return new StoreUnavailableError(
        `Booking store temporarily unavailable (${code})`,
        error,
      );
    }
    return error;
  }
}

import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { Booking } from '../booking/entities/booking.entity';
import { CreateBookingTables1735689600000 } from '../migrations/1735689600000-create-booking-tables';
import { Resource } from '../resource/entities/resource.entity';

export type StoreDriver = 'postgres' | 'memory';

export const storeDriver: StoreDriver =
  process.env.BOOKING_STORE === 'memory' ? 'memory' : 'postgres';

// Only read when BOOKING_STORE=memory
export const memorySeedPath: string | undefined =
  process.env.BOOKING_MEMORY_SEED || undefined;

export const databaseConfig: TypeOrmModuleOptions = {
  type: 'postgres',
  host: process.env.DB_HOST ?? 'localhost',
  port: process.env.DB_PORT ? parseInt(process.env.DB_PORT, 10) : 5432,
  username: process.env.DB_USERNAME ?? 'postgres',
  password: process.env.DB_PASSWORD ?? 'postgres',
  database: process.env.DB_DATABASE ?? 'resource-booking',
  entities: [Resource, Booking],
  synchronize: process.env.DB_SYNCHRONIZE === 'true',
  logging: process.env.DB_LOGGING === 'true',
  migrations: [CreateBookingTables1735689600000],
  // Applies pending migrations at startup unless DB_MIGRATIONS_RUN=false
  migrationsRun: process.env.DB_MIGRATIONS_RUN !== 'false',
  extra: {
    // node-postgres pool options
    max: parseInt(process.env.DB_POOL_MAX || '20', 10),
    min: parseInt(process.env.DB_POOL_MIN || '2', 10),
    idleTimeoutMillis: parseInt(process.env.DB_POOL_IDLE_TIMEOUT || '30000', 10),
    connectionTimeoutMillis: parseInt(
      process.env.DB_POOL_CONNECTION_TIMEOUT || '15000',
      10,
    ),
  },
};

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BookingModule } from './booking/booking.module';
import {
  databaseConfig,
  memorySeedPath,
  storeDriver,
} from './config/database.config';

@Module({
  imports: [
    ...(storeDriver === 'postgres'
      ? [TypeOrmModule.forRoot(databaseConfig)]
      : []),
    BookingModule.register({ store: storeDriver, seedPath: memorySeedPath }),
  ],
})
export class AppModule {}

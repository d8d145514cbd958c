import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Resource } from '../../resource/entities/resource.entity';

export enum BookingStatus {
  PENDING = 'PENDING',
  APPROVED = 'APPROVED',
  REJECTED = 'REJECTED',
  CONFIRMED = 'CONFIRMED',
  IN_USE = 'IN_USE',
  COMPLETED = 'COMPLETED',
  CANCELLED = 'CANCELLED',
}

/**
 * Statuses that hold the resource. PENDING counts as a soft hold so that two
 * pending requests for the same slot cannot both be approved later.
 */
export const ACTIVE_BOOKING_STATUSES: readonly BookingStatus[] = [
  BookingStatus.PENDING,
  BookingStatus.APPROVED,
  BookingStatus.CONFIRMED,
  BookingStatus.IN_USE,
];

export const isActiveStatus = (status: BookingStatus): boolean =>
  ACTIVE_BOOKING_STATUSES.includes(status);

@Entity('booking')
@Index('IDX_booking_resource_status', ['resource_id', 'status'])
@Index('IDX_booking_resource_time', ['resource_id', 'start_time', 'end_time'])
@Index('IDX_booking_requester', ['requester_id'])
@Index('IDX_booking_series', ['series_id'], { where: 'series_id IS NOT NULL' })
export class Booking {
  @PrimaryColumn('uuid', { primaryKeyConstraintName: 'PK_booking' })
  id!: string;

  @Column({ type: 'uuid' })
  resource_id!: string;

  @ManyToOne(() => Resource, { onDelete: 'RESTRICT' })
  @JoinColumn({
    name: 'resource_id',
    foreignKeyConstraintName: 'FK_booking_resource',
  })
  resource?: Resource;

  @Column({ type: 'varchar', length: 255 })
  requester_id!: string;

  @Column({ type: 'timestamptz' })
  start_time!: Date;

  @Column({ type: 'timestamptz' })
  end_time!: Date;

  @Column({ type: 'enum', enum: BookingStatus, default: BookingStatus.PENDING })
  status!: BookingStatus;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'text', nullable: true })
  purpose!: string | null;

  @Column({ type: 'int', nullable: true })
  attendees!: number | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  contact_info!: string | null;

  @Column({ type: 'text', nullable: true })
  special_requirements!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  approver_id!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  approved_at!: Date | null;

  @Column({ type: 'text', nullable: true })
  status_reason!: string | null;

  @Column({ type: 'uuid', nullable: true })
  series_id!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}

import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

export enum ResourceCategory {
  TRANSPORTATION = 'TRANSPORTATION',
  MEETING_ROOM = 'MEETING_ROOM',
  IT_EQUIPMENT = 'IT_EQUIPMENT',
  TOOL = 'TOOL',
  FACILITY = 'FACILITY',
}

export enum ResourceStatus {
  AVAILABLE = 'AVAILABLE',
  MAINTENANCE = 'MAINTENANCE',
  RETIRED = 'RETIRED',
}

export const RESOURCE_CATEGORIES: readonly ResourceCategory[] =
  Object.values(ResourceCategory);

@Entity('resource')
@Index('IDX_resource_category', ['category'])
export class Resource {
  @PrimaryColumn('uuid', { primaryKeyConstraintName: 'PK_resource' })
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'enum', enum: ResourceCategory })
  category!: ResourceCategory;

  @Column({ type: 'int' })
  capacity!: number;

  @Column({
    type: 'enum',
    enum: ResourceStatus,
    default: ResourceStatus.AVAILABLE,
  })
  status!: ResourceStatus;

  @Column({ type: 'varchar', length: 255, nullable: true })
  location!: string | null;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}

import { MigrationInterface } from 'typeorm';

// Satisfied by TypeORM's QueryRunner
interface SqlRunner {
  query(sql: string): Promise<unknown>;
}

export class CreateBookingTables1735689600000 implements MigrationInterface {
  name = 'CreateBookingTables1735689600000';

  async up(queryRunner: SqlRunner): Promise<void> {
    await queryRunner.query(
      `CREATE TYPE "resource_category_enum" AS ENUM ('TRANSPORTATION', 'MEETING_ROOM', 'IT_EQUIPMENT', 'TOOL', 'FACILITY')`,
    );
    await queryRunner.query(
      `CREATE TYPE "resource_status_enum" AS ENUM ('AVAILABLE', 'MAINTENANCE', 'RETIRED')`,
    );
    await queryRunner.query(
      `CREATE TYPE "booking_status_enum" AS ENUM ('PENDING', 'APPROVED', 'REJECTED', 'CONFIRMED', 'IN_USE', 'COMPLETED', 'CANCELLED')`,
    );

    await queryRunner.query(`
      CREATE TABLE "resource" (
        "id" uuid NOT NULL,
        "name" varchar(255) NOT NULL,
        "category" "resource_category_enum" NOT NULL,
        "capacity" integer NOT NULL,
        "status" "resource_status_enum" NOT NULL DEFAULT 'AVAILABLE',
        "location" varchar(255),
        "description" text,
        "created_at" timestamptz NOT NULL DEFAULT now(),
        "updated_at" timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT "PK_resource" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_resource_category" ON "resource" ("category")`,
    );

    await queryRunner.query(`
      CREATE TABLE "booking" (
        "id" uuid NOT NULL,
        "resource_id" uuid NOT NULL,
        "requester_id" varchar(255) NOT NULL,
        "start_time" timestamptz NOT NULL,
        "end_time" timestamptz NOT NULL,
        "status" "booking_status_enum" NOT NULL DEFAULT 'PENDING',
        "title" varchar(200) NOT NULL,
        "description" text,
        "purpose" text,
        "attendees" integer,
        "contact_info" varchar(255),
        "special_requirements" text,
        "approver_id" varchar(255),
        "approved_at" timestamptz,
        "status_reason" text,
        "series_id" uuid,
        "created_at" timestamptz NOT NULL DEFAULT now(),
        "updated_at" timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT "PK_booking" PRIMARY KEY ("id"),
        CONSTRAINT "FK_booking_resource" FOREIGN KEY ("resource_id")
          REFERENCES "resource" ("id") ON DELETE RESTRICT
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_booking_resource_status" ON "booking" ("resource_id", "status")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_booking_resource_time" ON "booking" ("resource_id", "start_time", "end_time")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_booking_requester" ON "booking" ("requester_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_booking_series" ON "booking" ("series_id") WHERE series_id IS NOT NULL`,
    );
  }

  async down(queryRunner: SqlRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE "booking"`);
    await queryRunner.query(`DROP TABLE "resource"`);
    await queryRunner.query(`DROP TYPE "booking_status_enum"`);
    await queryRunner.query(`DROP TYPE "resource_status_enum"`);
    await queryRunner.query(`DROP TYPE "resource_category_enum"`);
  }
}

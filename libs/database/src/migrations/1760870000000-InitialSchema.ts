import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema migration: creates the contents and pipeline_jobs tables.
 *
 * Hand-written to match the entity definitions. The SQL is PostgreSQL-specific
 * (uuid_generate_v4, timestamptz, partial unique indexes).
 *
 * The two partial unique indexes carry the deduplication guarantees:
 *   - one PENDING/PROCESSING job per resource_key
 *   - one job per non-null idempotency_key
 */
export class InitialSchema1760870000000 implements MigrationInterface {
  name = 'InitialSchema1760870000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // ── Enable UUID extension ──────────────────────────────
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    // ── Contents table ─────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "contents" (
        "id"                uuid NOT NULL DEFAULT uuid_generate_v4(),
        "title"             varchar(500) NOT NULL,
        "content_type"      varchar(64) NOT NULL,
        "source_url"        varchar(2048),
        "metadata"          text,
        "processing_status" varchar(16),
        "pipeline_version"  varchar(64),
        "processing_result" text,
        "processed_at"      TIMESTAMPTZ,
        "created_at"        TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"        TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_contents" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_contents_pipeline_version" ON "contents" ("pipeline_version")`,
    );

    // ── Pipeline jobs table ────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "pipeline_jobs" (
        "id"                  uuid NOT NULL,
        "resource_key"        varchar(255) NOT NULL,
        "content_id"          uuid NOT NULL,
        "status"              varchar(16) NOT NULL DEFAULT 'pending',
        "pipeline_version"    varchar(64) NOT NULL,
        "data_tier"           varchar(16) NOT NULL DEFAULT 'compact',
        "idempotency_key"     varchar(255),
        "error_code"          varchar(64),
        "error_message"       text,
        "error_stage"         varchar(32),
        "metadata"            text,
        "cancel_requested_at" TIMESTAMPTZ,
        "created_at"          TIMESTAMPTZ NOT NULL,
        "started_at"          TIMESTAMPTZ,
        "finished_at"         TIMESTAMPTZ,
        CONSTRAINT "PK_pipeline_jobs" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_pipeline_jobs_status" CHECK (
          "status" IN ('pending', 'processing', 'completed', 'failed', 'cancelled')
        ),
        CONSTRAINT "CHK_pipeline_jobs_data_tier" CHECK ("data_tier" IN ('compact', 'full')),
        CONSTRAINT "FK_pipeline_jobs_content" FOREIGN KEY ("content_id")
          REFERENCES "contents"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_pipeline_jobs_active_resource_key" ON "pipeline_jobs" ("resource_key") WHERE "status" IN ('pending', 'processing')`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_pipeline_jobs_idempotency_key" ON "pipeline_jobs" ("idempotency_key") WHERE "idempotency_key" IS NOT NULL`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_pipeline_jobs_content_status" ON "pipeline_jobs" ("content_id", "status")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_pipeline_jobs_tier_finished" ON "pipeline_jobs" ("data_tier", "finished_at")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    // ── Drop tables (reverse order of creation) ────────────
    await queryRunner.query(`DROP TABLE IF EXISTS "pipeline_jobs"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "contents"`);

    // ── Drop extension ─────────────────────────────────────
    await queryRunner.query(`DROP EXTENSION IF EXISTS "uuid-ossp"`);
  }
}

import {
  Entity,
  PrimaryColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Content } from './content.entity';
import { JobStatus } from '../enums/job-status.enum';
import { DataTier } from '../enums/data-tier.enum';
import { ErrorStage } from '../enums/error-stage.enum';
import { JobMetadata } from '../types/result-summary';

/**
 * PipelineJob entity: one tracked run of the unified pipeline for a content item.
 *
 * Invariants:
 * - At most one job per resource_key is PENDING or PROCESSING
 *   (enforced by the partial unique index below, not by application code)
 * - idempotency_key is unique when present
 * - Terminal states: COMPLETED, FAILED, CANCELLED; never left once reached
 * - started_at is set exactly once, on PENDING → PROCESSING
 * - finished_at is set exactly once, on entering a terminal state
 * - error_* columns are set only on FAILED
 * - pipeline_version and data_tier are written at creation and never updated
 */
@Entity('pipeline_jobs')
@Index('UQ_pipeline_jobs_active_resource_key', ['resourceKey'], {
  unique: true,
  where: `"status" IN ('pending', 'processing')`,
})
@Index('UQ_pipeline_jobs_idempotency_key', ['idempotencyKey'], {
  unique: true,
  where: `"idempotency_key" IS NOT NULL`,
})
@Index('IDX_pipeline_jobs_content_status', ['contentId', 'status'])
@Index('IDX_pipeline_jobs_tier_finished', ['dataTier', 'finishedAt'])
export class PipelineJob {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255, name: 'resource_key' })
  resourceKey!: string;

  @Column({ type: 'uuid', name: 'content_id' })
  contentId!: string;

  @Column({ type: 'varchar', length: 16, default: JobStatus.PENDING })
  status!: JobStatus;

  @Column({ type: 'varchar', length: 64, name: 'pipeline_version' })
  pipelineVersion!: string;

  @Column({
    type: 'varchar',
    length: 16,
    name: 'data_tier',
    default: DataTier.COMPACT,
  })
  dataTier!: DataTier;

  @Column({
    type: 'varchar',
    length: 255,
    name: 'idempotency_key',
    nullable: true,
  })
  idempotencyKey!: string | null;

  @Column({ type: 'varchar', length: 64, name: 'error_code', nullable: true })
  errorCode!: string | null;

  @Column({ type: 'text', name: 'error_message', nullable: true })
  errorMessage!: string | null;

  @Column({ type: 'varchar', length: 32, name: 'error_stage', nullable: true })
  errorStage!: ErrorStage | null;

  @Column({ type: 'simple-json', nullable: true })
  metadata!: JobMetadata | null;

  @Column({ type: Date, name: 'cancel_requested_at', nullable: true })
  cancelRequestedAt!: Date | null;

  @Column({ type: Date, name: 'created_at' })
  createdAt!: Date;

  @Column({ type: Date, name: 'started_at', nullable: true })
  startedAt!: Date | null;

  @Column({ type: Date, name: 'finished_at', nullable: true })
  finishedAt!: Date | null;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => Content, (content) => content.pipelineJobs, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'content_id' })
  content!: Content;
}

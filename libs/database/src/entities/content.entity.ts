import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { PipelineJob } from './pipeline-job.entity';
import { JobStatus } from '../enums/job-status.enum';
import { ResultSummary } from '../types/result-summary';

/**
 * Content entity: an ingested item the pipeline processes.
 *
 * Rows are created by ingestion, which lives outside this service. The
 * orchestrator only writes the processing_* projection columns:
 * - processing_status mirrors the latest job outcome (last write wins)
 * - processing_result holds the result summary of the latest completed job
 * - pipeline_version is the version that produced processing_result
 *
 * The projection is never authoritative; pipeline_jobs is.
 */
@Entity('contents')
export class Content {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 500 })
  title!: string;

  @Column({ type: 'varchar', length: 64, name: 'content_type' })
  contentType!: string;

  @Column({ type: 'varchar', length: 2048, name: 'source_url', nullable: true })
  sourceUrl!: string | null;

  @Column({ type: 'simple-json', nullable: true })
  metadata!: Record<string, string> | null;

  @Column({
    type: 'varchar',
    length: 16,
    name: 'processing_status',
    nullable: true,
  })
  processingStatus!: JobStatus | null;

  @Index('IDX_contents_pipeline_version')
  @Column({
    type: 'varchar',
    length: 64,
    name: 'pipeline_version',
    nullable: true,
  })
  pipelineVersion!: string | null;

  @Column({ type: 'simple-json', name: 'processing_result', nullable: true })
  processingResult!: ResultSummary | null;

  @Column({ type: Date, name: 'processed_at', nullable: true })
  processedAt!: Date | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @OneToMany(() => PipelineJob, (job) => job.content, { cascade: false })
  pipelineJobs!: PipelineJob[];
}

import {
  DataTier,
  ErrorStage,
  JobMetadata,
  JobStatus,
  PipelineJob,
} from '@jobflow/database';

/** Upper bound on stored error messages */
export const MAX_ERROR_MESSAGE_LENGTH = 500;

export interface CreateJobInput {
  resourceKey: string;
  contentId: string;
  pipelineVersion: string;
  dataTier: DataTier;
  idempotencyKey?: string | null;
}

export interface CreateJobResult {
  job: PipelineJob;
  /** false when an existing job was returned instead of inserting one */
  created: boolean;
}

export interface JobError {
  code: string;
  message: string;
  stage: ErrorStage;
}

export interface TransitionDetail {
  /** Recorded only when moving to FAILED */
  error?: JobError;
  metadata?: JobMetadata | null;
}

export interface ListJobsQuery {
  contentId?: string;
  status?: JobStatus;
  limit: number;
  offset: number;
}

export interface JobPage {
  items: PipelineJob[];
  total: number;
}

/**
 * JobStore: authoritative record of every pipeline job.
 *
 * Invariants every implementation upholds:
 * - at most one PENDING/PROCESSING job per resource key, atomically
 * - an idempotency key maps to exactly one job
 * - transitions of one job are totally ordered (conditional on current status)
 * - started_at / finished_at are written by the store, never by callers
 */
export abstract class JobStore {
  /**
   * Returns the job owning `idempotencyKey`, else the active job for the
   * resource key, else a newly inserted PENDING job.
   */
  abstract createIfAbsent(input: CreateJobInput): Promise<CreateJobResult>;

  /**
   * @throws JobNotFoundError
   * @throws InvalidTransitionError when `next` is not reachable from the
   *   current status, including when another writer moved the job first
   */
  abstract transition(
    jobId: string,
    next: JobStatus,
    detail?: TransitionDetail,
  ): Promise<PipelineJob>;

  /** @throws JobNotFoundError */
  abstract get(jobId: string): Promise<PipelineJob>;

  /** Newest first; `total` counts every job matching the filters */
  abstract list(query: ListJobsQuery): Promise<JobPage>;

  /** Deletes terminal jobs of `tier` finished before `cutoff`; returns the count */
  abstract purgeExpired(tier: DataTier, cutoff: Date): Promise<number>;

  /** Flags a PROCESSING job for cancellation at the stage boundary */
  abstract requestCancellation(jobId: string): Promise<boolean>;

  /** Oldest first */
  abstract findByStatus(status: JobStatus): Promise<PipelineJob[]>;
}

import { JobStatus, ResultSummary } from '@jobflow/database';

/**
 * ContentStatusProjector: mirrors job outcomes onto the content record so
 * readers of content do not need to join pipeline_jobs.
 *
 * The projection is last-write-wins and never authoritative: a failed
 * projection write is logged by the caller and does not change job state.
 */
export abstract class ContentStatusProjector {
  abstract update(
    contentId: string,
    status: JobStatus,
    pipelineVersion?: string,
  ): Promise<void>;

  /** Stores the summary of a successful run and the version that produced it */
  abstract recordResult(
    contentId: string,
    summary: ResultSummary,
    pipelineVersion: string,
  ): Promise<void>;
}

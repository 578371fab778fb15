/**
 * Lifecycle status of a pipeline job.
 *
 * Transitions:
 *   PENDING → PROCESSING → COMPLETED
 *                        → FAILED
 *   PENDING → CANCELLED
 *   PROCESSING → CANCELLED   (only at the stage boundary, before the processor runs)
 *
 * At most one job per resource key may be PENDING or PROCESSING at a time.
 */
export enum JobStatus {
  /** Job recorded, waiting for a concurrency slot */
  PENDING = 'pending',

  /** Job admitted and handed to the processor */
  PROCESSING = 'processing',

  /** Processor returned a valid result and it was persisted */
  COMPLETED = 'completed',

  /** Job failed (see error_code / error_stage for details) */
  FAILED = 'failed',

  /** Job cancelled before the processor was invoked */
  CANCELLED = 'cancelled',
}

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = [
  JobStatus.COMPLETED,
  JobStatus.FAILED,
  JobStatus.CANCELLED,
];

export const ACTIVE_JOB_STATUSES: readonly JobStatus[] = [
  JobStatus.PENDING,
  JobStatus.PROCESSING,
];

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

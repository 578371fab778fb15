import { JobStatus } from '@jobflow/database';

export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`);
    this.name = 'JobNotFoundError';
  }
}

/** Thrown when a transition is not allowed from the job's current status */
export class InvalidTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus,
  ) {
    super(`Job ${jobId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { randomUUID } from 'node:crypto';
import {
  FindOptionsWhere,
  In,
  IsNull,
  LessThan,
  QueryFailedError,
  Repository,
} from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import {
  ACTIVE_JOB_STATUSES,
  DataTier,
  JobStatus,
  PipelineJob,
  TERMINAL_JOB_STATUSES,
  isTerminalStatus,
} from '@jobflow/database';
import { canTransition } from './job-state-machine';
import { InvalidTransitionError, JobNotFoundError } from './job-store.errors';
import {
  CreateJobInput,
  CreateJobResult,
  JobPage,
  JobStore,
  ListJobsQuery,
  MAX_ERROR_MESSAGE_LENGTH,
  TransitionDetail,
} from './job-store';

/** Unique-violation codes of the drivers we run on (pg, better-sqlite3) */
const UNIQUE_VIOLATION_CODES: ReadonlySet<string> = new Set([
  '23505',
  'SQLITE_CONSTRAINT_UNIQUE',
]);

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  if (
    typeof driverError !== 'object' ||
    driverError === null ||
    !('code' in driverError)
  ) {
    return false;
  }
  return (
    typeof driverError.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(driverError.code)
  );
}

function truncateErrorMessage(message: string): string {
  return message.length > MAX_ERROR_MESSAGE_LENGTH
    ? message.slice(0, MAX_ERROR_MESSAGE_LENGTH)
    : message;
}

/**
 * TypeOrmJobStore: JobStore over the pipeline_jobs table.
 *
 * Deduplication is delegated to two partial unique indexes:
 *   UQ_pipeline_jobs_active_resource_key  (status IN pending, processing)
 *   UQ_pipeline_jobs_idempotency_key      (idempotency_key IS NOT NULL)
 * A losing concurrent insert re-reads and returns the winner.
 *
 * Transitions are `UPDATE … WHERE id = ? AND status = <expected>`; zero
 * affected rows means another writer got there first.
 */
@Injectable()
export class TypeOrmJobStore extends JobStore {
  private readonly logger = new Logger(TypeOrmJobStore.name);

  constructor(
    @InjectRepository(PipelineJob)
    private readonly jobRepository: Repository<PipelineJob>,
  ) {
    super();
  }

  async createIfAbsent(input: CreateJobInput): Promise<CreateJobResult> {
    const existing = await this.findExisting(input);
    if (existing) {
      return { job: existing, created: false };
    }

    const job = this.jobRepository.create({
      id: randomUUID(),
      resourceKey: input.resourceKey,
      contentId: input.contentId,
      status: JobStatus.PENDING,
      pipelineVersion: input.pipelineVersion,
      dataTier: input.dataTier,
      idempotencyKey: input.idempotencyKey ?? null,
      errorCode: null,
      errorMessage: null,
      errorStage: null,
      metadata: null,
      cancelRequestedAt: null,
      createdAt: new Date(),
      startedAt: null,
      finishedAt: null,
    });

    try {
      await this.jobRepository.insert(job);
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw error;
      }
      const winner = await this.findExisting(input);
      if (!winner) {
        throw error;
      }
      this.logger.debug(
        `Lost insert race for ${input.resourceKey}; returning job ${winner.id}`,
      );
      return { job: winner, created: false };
    }

    this.logger.log(
      `Created job ${job.id} for ${input.resourceKey} (content ${input.contentId}, tier ${input.dataTier})`,
    );
    return { job, created: true };
  }

  async transition(
    jobId: string,
    next: JobStatus,
    detail: TransitionDetail = {},
  ): Promise<PipelineJob> {
    const job = await this.get(jobId);
    if (!canTransition(job.status, next)) {
      throw new InvalidTransitionError(jobId, job.status, next);
    }

    const now = new Date();
    const patch: QueryDeepPartialEntity<PipelineJob> = { status: next };

    if (next === JobStatus.PROCESSING) {
      patch.startedAt = now;
    }
    if (isTerminalStatus(next)) {
      patch.finishedAt = now;
    }
    if (next === JobStatus.FAILED && detail.error) {
      patch.errorCode = detail.error.code;
      patch.errorMessage = truncateErrorMessage(detail.error.message);
      patch.errorStage = detail.error.stage;
    }
    if (detail.metadata !== undefined) {
      patch.metadata = detail.metadata;
    }

    const result = await this.jobRepository.update(
      { id: jobId, status: job.status },
      patch,
    );

    if (!result.affected) {
      const current = await this.get(jobId);
      throw new InvalidTransitionError(jobId, current.status, next);
    }

    this.logger.debug(`Job ${jobId}: ${job.status} → ${next}`);
    return this.get(jobId);
  }

  async get(jobId: string): Promise<PipelineJob> {
    const job = await this.jobRepository.findOne({ where: { id: jobId } });
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  async list(query: ListJobsQuery): Promise<JobPage> {
    const where: FindOptionsWhere<PipelineJob> = {};
    if (query.contentId) {
      where.contentId = query.contentId;
    }
    if (query.status) {
      where.status = query.status;
    }

    const [items, total] = await this.jobRepository.findAndCount({
      where,
      order: { createdAt: 'DESC', id: 'DESC' },
      take: query.limit,
      skip: query.offset,
    });

    return { items, total };
  }

  async purgeExpired(tier: DataTier, cutoff: Date): Promise<number> {
    const result = await this.jobRepository.delete({
      dataTier: tier,
      status: In([...TERMINAL_JOB_STATUSES]),
      finishedAt: LessThan(cutoff),
    });
    return result.affected ?? 0;
  }

  async requestCancellation(jobId: string): Promise<boolean> {
    const result = await this.jobRepository.update(
      { id: jobId, status: JobStatus.PROCESSING, cancelRequestedAt: IsNull() },
      { cancelRequestedAt: new Date() },
    );
    if (result.affected) {
      return true;
    }

    const job = await this.get(jobId);
    return job.status === JobStatus.PROCESSING && job.cancelRequestedAt !== null;
  }

  findByStatus(status: JobStatus): Promise<PipelineJob[]> {
    return this.jobRepository.find({
      where: { status },
      order: { createdAt: 'ASC' },
    });
  }

  // ── Private helpers ──────────────────────────────────────

  private async findExisting(
    input: CreateJobInput,
  ): Promise<PipelineJob | null> {
    if (input.idempotencyKey) {
      const owner = await this.jobRepository.findOne({
        where: { idempotencyKey: input.idempotencyKey },
      });
      if (owner) {
        return owner;
      }
    }

    return this.jobRepository.findOne({
      where: {
        resourceKey: input.resourceKey,
        status: In([...ACTIVE_JOB_STATUSES]),
      },
    });
  }
}

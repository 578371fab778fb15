import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import {
  Content,
  JobStatus,
  PipelineJob,
  isTerminalStatus,
} from '@jobflow/database';
import { CreateJobResult, JobStore } from '../job-store/job-store';
import { JobNotFoundError } from '../job-store/job-store.errors';
import {
  InvalidResourceIdentifierError,
  ResourceKind,
} from '../resource-key/resource-key.codec';
import {
  CancelOutcome,
  CancelResult,
  PipelineOrchestratorService,
} from '../pipeline/pipeline-orchestrator.service';
import { VersionDriftService } from '../content/version-drift.service';
import {
  CancelJobResponseDto,
  JobDetailResponseDto,
  JobListResponseDto,
  JobStatusResponseDto,
} from './dto/job-response.dto';
import { ListJobsQueryDto } from './dto/list-jobs-query.dto';
import { ReprocessQueryDto } from './dto/reprocess-query.dto';
import { ReprocessResponseDto } from './dto/reprocess-response.dto';
import { DriftReportResponseDto } from './dto/drift-report-response.dto';
import {
  ContentNotFoundException,
  InvalidIdempotencyKeyException,
  InvalidResourceIdentifierException,
  JobNotFoundException,
  JobSubmissionException,
} from './exceptions/job.exceptions';

const MAX_IDEMPOTENCY_KEY_LENGTH = 255;

const CANCEL_MESSAGES: Record<CancelOutcome, string> = {
  cancelled: 'Job cancelled',
  cancel_requested:
    'Cancellation requested; best effort, it only takes effect if the processor has not started yet',
  already_terminal: 'Job already in a terminal state',
};

interface ResourceIdentity {
  kind: ResourceKind;
  identifier: string;
}

/**
 * JobsService: HTTP-facing operations over pipeline jobs.
 *
 * Translates domain errors from the store, codec and orchestrator into
 * HttpExceptions and shapes entities into the snake_case wire format.
 * Audit events are logged as `audit.<event> key=value` lines.
 */
@Injectable()
export class JobsService {
  private readonly logger = new Logger(JobsService.name);

  constructor(
    @InjectRepository(Content)
    private readonly contentRepository: Repository<Content>,

    private readonly jobStore: JobStore,
    private readonly orchestrator: PipelineOrchestratorService,
    private readonly driftService: VersionDriftService,
  ) {}

  /**
   * 1. 404 when the content does not exist
   * 2. already_completed when its projection is completed and force is off
   * 3. Submit (or join) the job for the content's resource key
   */
  async reprocess(
    contentId: string,
    query: ReprocessQueryDto,
    idempotencyKey?: string,
  ): Promise<ReprocessResponseDto> {
    const key = this.normalizeIdempotencyKey(idempotencyKey);

    const content = await this.contentRepository.findOne({
      where: { id: contentId },
    });
    if (!content) {
      throw new ContentNotFoundException(contentId);
    }

    this.logger.log(
      `audit.reprocess_trigger content_id=${contentId} force=${query.force}`,
    );

    if (!query.force && content.processingStatus === JobStatus.COMPLETED) {
      return {
        job_id: null,
        content_id: contentId,
        status: 'already_completed',
      };
    }

    const identity = this.resourceIdentity(content);
    let result: CreateJobResult;
    try {
      result = await this.orchestrator.submit({
        contentId,
        kind: identity.kind,
        identifier: identity.identifier,
        dataTier: query.tier,
        idempotencyKey: key,
      });
    } catch (error) {
      if (error instanceof InvalidResourceIdentifierError) {
        throw new InvalidResourceIdentifierException(error.message, error);
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Job submission for content ${contentId} failed: ${cause.message}`,
        cause.stack,
      );
      throw new JobSubmissionException(cause);
    }

    const { job, created } = result;
    // A replayed idempotency key answers with the original submission
    const joinedActive = !created && !isTerminalStatus(job.status);

    return {
      job_id: job.id,
      content_id: contentId,
      status: joinedActive ? 'already_active' : 'submitted',
    };
  }

  async getJob(
    jobId: string,
    verbose: boolean,
  ): Promise<JobStatusResponseDto | JobDetailResponseDto> {
    const job = await this.findJob(jobId);

    if (!verbose) {
      return this.toStatusResponse(job);
    }

    this.logger.log(`audit.full_tier_access job_id=${jobId}`);
    return {
      ...this.toStatusResponse(job),
      error_code: job.errorCode,
      error_message: job.errorMessage,
      error_stage: job.errorStage,
      resource_key: job.resourceKey,
      pipeline_version: job.pipelineVersion,
      data_tier: job.dataTier,
      metadata: job.metadata,
    };
  }

  async listJobs(query: ListJobsQueryDto): Promise<JobListResponseDto> {
    const page = await this.jobStore.list({
      contentId: query.content_id,
      status: query.status,
      limit: query.limit,
      offset: query.offset,
    });

    return {
      jobs: page.items.map((job) => this.toStatusResponse(job)),
      total: page.total,
    };
  }

  async cancelJob(jobId: string): Promise<CancelJobResponseDto> {
    let cancellation: CancelResult;
    try {
      cancellation = await this.orchestrator.cancel(jobId);
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        throw new JobNotFoundException(jobId);
      }
      throw error;
    }

    const { job, outcome } = cancellation;
    this.logger.log(
      `audit.cancellation job_id=${jobId} outcome=${outcome} status=${job.status}`,
    );

    return {
      job_id: job.id,
      status: job.status,
      cancelled: outcome === 'cancelled',
      message: CANCEL_MESSAGES[outcome],
    };
  }

  async driftReport(): Promise<DriftReportResponseDto> {
    const report = await this.driftService.report();
    return {
      current_version: report.currentVersion,
      stale_content: report.staleContent,
      total_stale: report.totalStale,
      unknown_version_count: report.unknownVersionCount,
      total_content: report.totalContent,
    };
  }

  // ── Private helpers ──────────────────────────────────────

  private async findJob(jobId: string): Promise<PipelineJob> {
    try {
      return await this.jobStore.get(jobId);
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        throw new JobNotFoundException(jobId);
      }
      throw error;
    }
  }

  /**
   * youtube content with a video_id → yt:<video_id>
   * content with a source URL       → url:<hash of normalized URL>
   * anything else                   → cid:<content id>
   */
  private resourceIdentity(content: Content): ResourceIdentity {
    const videoId = content.metadata?.video_id;
    if (content.contentType === 'youtube' && videoId) {
      return { kind: 'youtube', identifier: videoId };
    }
    if (content.sourceUrl) {
      return { kind: 'url', identifier: content.sourceUrl };
    }
    return { kind: 'content', identifier: content.id };
  }

  private normalizeIdempotencyKey(raw?: string): string | null {
    if (raw === undefined) {
      return null;
    }
    const key = raw.trim();
    if (key.length === 0 || key.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
      throw new InvalidIdempotencyKeyException(MAX_IDEMPOTENCY_KEY_LENGTH);
    }
    return key;
  }

  private toStatusResponse(job: PipelineJob): JobStatusResponseDto {
    return {
      job_id: job.id,
      content_id: job.contentId,
      status: job.status,
      created_at: job.createdAt.toISOString(),
      started_at: job.startedAt?.toISOString() ?? null,
      finished_at: job.finishedAt?.toISOString() ?? null,
    };
  }
}

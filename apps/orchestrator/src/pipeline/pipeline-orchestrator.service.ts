import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DataTier,
  ErrorCode,
  ErrorStage,
  JobMetadata,
  JobStatus,
  PipelineJob,
  ResultSummary,
  isTerminalStatus,
} from '@jobflow/database';
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from '../config/pipeline.settings';
import { BackgroundTaskRegistry } from '../tasks/background-task.registry';
import {
  ResourceKeyCodec,
  ResourceKind,
} from '../resource-key/resource-key.codec';
import { JobStore, CreateJobResult } from '../job-store/job-store';
import {
  InvalidTransitionError,
  JobNotFoundError,
} from '../job-store/job-store.errors';
import { ContentStatusProjector } from '../content/content-status.projector';
import { CallbackDispatcher } from '../callbacks/callback-dispatcher.service';
import { ConcurrencyGate } from './concurrency-gate';
import {
  PipelineStageError,
  classifyProcessorError,
} from './pipeline-stage.error';
import { summaryRejection } from './result-summary.validation';
import { Processor, ProcessorInput } from './processors/processor';

export interface SubmitRequest {
  contentId: string;
  kind: ResourceKind;
  identifier: string;
  dataTier?: DataTier;
  idempotencyKey?: string | null;
}

export type CancelOutcome =
  | 'cancelled'
  | 'cancel_requested'
  | 'already_terminal';

export interface CancelResult {
  job: PipelineJob;
  outcome: CancelOutcome;
}

/** Terminal job plus the summary a completed run produced */
interface ExecutionOutcome {
  job: PipelineJob;
  summary: ResultSummary | null;
}

/**
 * PipelineOrchestratorService: drives jobs through the pipeline.
 *
 * Responsibilities:
 * 1. submit()  : derive the resource key, create-or-reuse the job, schedule it
 * 2. execute() : [background] run one job inside the concurrency gate
 * 3. cancel()  : cancel a pending job or flag a processing one
 *
 * Execution order inside the gate:
 *   pending → processing → (cancel boundary) → Processor
 *     → validate summary → record result → completed | failed
 * The webhook is scheduled after the gate slot is released.
 *
 * execute() never throws: every failure is classified onto the job row
 * or logged.
 */
@Injectable()
export class PipelineOrchestratorService {
  private readonly logger = new Logger(PipelineOrchestratorService.name);

  constructor(
    private readonly jobStore: JobStore,
    private readonly projector: ContentStatusProjector,
    private readonly processor: Processor,
    private readonly gate: ConcurrencyGate,
    private readonly codec: ResourceKeyCodec,
    private readonly tasks: BackgroundTaskRegistry,
    private readonly callbacks: CallbackDispatcher,

    @Inject(PIPELINE_SETTINGS)
    private readonly settings: PipelineSettings,
  ) {}

  // ── Public methods ───────────────────────────────────────

  /**
   * Returns as soon as the job row exists. A job that already existed
   * (same active resource key or same idempotency key) is returned with
   * `created: false` and is not scheduled again.
   *
   * @throws InvalidResourceIdentifierError synchronously for bad identifiers
   */
  async submit(request: SubmitRequest): Promise<CreateJobResult> {
    const resourceKey = this.codec.derive(request.kind, request.identifier);
    const pipelineVersion = this.settings.pipelineVersion;

    const result = await this.jobStore.createIfAbsent({
      resourceKey,
      contentId: request.contentId,
      pipelineVersion,
      dataTier: request.dataTier ?? this.settings.defaultDataTier,
      idempotencyKey: request.idempotencyKey ?? null,
    });

    if (!result.created) {
      this.logger.log(
        `Job ${result.job.id} already exists for ${resourceKey} (${result.job.status})`,
      );
      return result;
    }

    await this.project(request.contentId, JobStatus.PENDING, pipelineVersion);
    this.schedule(result.job.id);
    return result;
  }

  /** Starts execute() as a tracked background task */
  schedule(jobId: string): void {
    this.tasks.run(`execute:${jobId}`, (signal) => this.execute(jobId, signal));
  }

  async execute(jobId: string, signal?: AbortSignal): Promise<void> {
    let outcome: ExecutionOutcome | null;
    try {
      outcome = await this.gate.run(() => this.runAdmitted(jobId, signal));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Execution of job ${jobId} aborted: ${message}`);
      return;
    }

    if (outcome && this.callbacks.enabled) {
      const { job, summary } = outcome;
      this.tasks.run(`callback:${job.id}`, async (callbackSignal) => {
        await this.callbacks.notify(job, summary, callbackSignal);
      });
    }
  }

  /**
   * - pending    → cancelled immediately; the Processor never runs
   * - processing → flagged; honoured at the boundary before the Processor
   * - terminal   → unchanged
   *
   * @throws JobNotFoundError
   */
  async cancel(jobId: string): Promise<CancelResult> {
    const job = await this.jobStore.get(jobId);

    if (isTerminalStatus(job.status)) {
      return { job, outcome: 'already_terminal' };
    }

    if (job.status === JobStatus.PENDING) {
      try {
        const cancelled = await this.jobStore.transition(
          jobId,
          JobStatus.CANCELLED,
        );
        await this.project(cancelled.contentId, JobStatus.CANCELLED);
        return { job: cancelled, outcome: 'cancelled' };
      } catch (error) {
        if (!(error instanceof InvalidTransitionError)) {
          throw error;
        }
        // Admitted between the read and the write; fall through to the flag
      }
    }

    const flagged = await this.jobStore.requestCancellation(jobId);
    const current = await this.jobStore.get(jobId);
    if (!flagged) {
      return { job: current, outcome: 'already_terminal' };
    }
    return { job: current, outcome: 'cancel_requested' };
  }

  // ── Private helpers ──────────────────────────────────────

  private async runAdmitted(
    jobId: string,
    signal?: AbortSignal,
  ): Promise<ExecutionOutcome | null> {
    let job: PipelineJob;
    try {
      job = await this.jobStore.get(jobId);
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        this.logger.warn(`Job ${jobId} disappeared before it was admitted`);
        return null;
      }
      throw error;
    }

    if (job.status !== JobStatus.PENDING) {
      this.logger.log(`Job ${jobId} is ${job.status}; skipping execution`);
      return null;
    }

    if (signal?.aborted) {
      await this.cancelOnShutdown(job);
      return null;
    }

    try {
      job = await this.jobStore.transition(jobId, JobStatus.PROCESSING);
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        this.logger.log(
          `Job ${jobId} left pending before admission (${error.from})`,
        );
        return null;
      }
      throw error;
    }
    await this.project(job.contentId, JobStatus.PROCESSING);

    const admittedAt = Date.now();
    try {
      return await this.runProcessing(job);
    } catch (error) {
      return this.failUnexpected(job, error, admittedAt);
    }
  }

  /** Everything after the PROCESSING transition; store errors escape to the caller */
  private async runProcessing(
    job: PipelineJob,
  ): Promise<ExecutionOutcome | null> {
    const jobId = job.id;

    // ── Cancellation boundary ──────────────────────────────
    const current = await this.jobStore.get(jobId);
    if (current.cancelRequestedAt) {
      const cancelled = await this.jobStore.transition(
        jobId,
        JobStatus.CANCELLED,
      );
      await this.project(cancelled.contentId, JobStatus.CANCELLED);
      this.logger.log(`Job ${jobId} cancelled at the stage boundary`);
      return null;
    }

    const startedAt = Date.now();
    let summary: ResultSummary;
    try {
      summary = await this.processor.process(this.toProcessorInput(job));
    } catch (error) {
      return this.fail(job, classifyProcessorError(error), startedAt);
    }

    const rejection = summaryRejection(summary);
    if (rejection) {
      return this.fail(
        job,
        new PipelineStageError(
          ErrorStage.VALIDATION,
          ErrorCode.VALIDATION_FAILED,
          rejection,
        ),
        startedAt,
      );
    }

    try {
      await this.projector.recordResult(
        job.contentId,
        summary,
        job.pipelineVersion,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.fail(
        job,
        new PipelineStageError(
          ErrorStage.PERSISTENCE,
          ErrorCode.PERSISTENCE_ERROR,
          `Failed to store result: ${message}`,
        ),
        startedAt,
      );
    }

    const completed = await this.jobStore.transition(
      jobId,
      JobStatus.COMPLETED,
      { metadata: this.metadataFor(job, startedAt, summary) },
    );
    await this.project(job.contentId, JobStatus.COMPLETED, job.pipelineVersion);

    this.logger.log(
      `Job ${jobId} completed in ${Date.now() - startedAt} ms (${job.resourceKey})`,
    );
    return { job: completed, summary };
  }

  private async fail(
    job: PipelineJob,
    error: PipelineStageError,
    startedAt: number,
  ): Promise<ExecutionOutcome> {
    this.logger.error(
      `Job ${job.id} failed at ${error.stage} (${error.code}): ${error.message}`,
    );

    const failed = await this.jobStore.transition(job.id, JobStatus.FAILED, {
      error: { code: error.code, message: error.message, stage: error.stage },
      metadata: this.metadataFor(job, startedAt, null),
    });
    await this.project(job.contentId, JobStatus.FAILED);

    return { job: failed, summary: null };
  }

  /**
   * Last resort for a job left in PROCESSING by a store error: record it as
   * a persistence failure so its resource key is released.
   */
  private async failUnexpected(
    job: PipelineJob,
    error: unknown,
    startedAt: number,
  ): Promise<ExecutionOutcome | null> {
    const message = error instanceof Error ? error.message : String(error);
    try {
      return await this.fail(
        job,
        new PipelineStageError(
          ErrorStage.PERSISTENCE,
          ErrorCode.PERSISTENCE_ERROR,
          `Unexpected error while processing: ${message}`,
        ),
        startedAt,
      );
    } catch (failError) {
      const failMessage =
        failError instanceof Error ? failError.message : String(failError);
      this.logger.error(
        `Job ${job.id} could not be marked failed after "${message}": ${failMessage}`,
      );
      return null;
    }
  }

  private async cancelOnShutdown(job: PipelineJob): Promise<void> {
    try {
      await this.jobStore.transition(job.id, JobStatus.CANCELLED);
      await this.project(job.contentId, JobStatus.CANCELLED);
      this.logger.warn(
        `Job ${job.id} cancelled: shutting down before admission`,
      );
    } catch (error) {
      if (!(error instanceof InvalidTransitionError)) {
        throw error;
      }
      this.logger.log(`Job ${job.id} already left pending (${error.from})`);
    }
  }

  /** Diagnostic detail, kept only on FULL-tier jobs */
  private metadataFor(
    job: PipelineJob,
    startedAt: number,
    summary: ResultSummary | null,
  ): JobMetadata | undefined {
    if (job.dataTier !== DataTier.FULL) {
      return undefined;
    }
    return {
      processor: this.processor.kind,
      duration_ms: Date.now() - startedAt,
      summary_fields: summary ? Object.keys(summary).length : 0,
    };
  }

  /** Projection failures are logged; job state stays authoritative */
  private async project(
    contentId: string,
    status: JobStatus,
    pipelineVersion?: string,
  ): Promise<void> {
    try {
      await this.projector.update(contentId, status, pipelineVersion);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Could not project ${status} onto content ${contentId}: ${message}`,
      );
    }
  }

  private toProcessorInput(job: PipelineJob): ProcessorInput {
    return {
      jobId: job.id,
      contentId: job.contentId,
      resourceKey: job.resourceKey,
      pipelineVersion: job.pipelineVersion,
      dataTier: job.dataTier,
    };
  }
}

import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ErrorCode, ErrorStage, JobStatus } from '@jobflow/database';
import { JobStore } from '../job-store/job-store';
import { InvalidTransitionError } from '../job-store/job-store.errors';
import { ContentStatusProjector } from '../content/content-status.projector';
import { PipelineOrchestratorService } from '../pipeline/pipeline-orchestrator.service';
import { BackgroundTaskRegistry } from '../tasks/background-task.registry';

export interface RecoverySummary {
  rescheduled: number;
  interrupted: number;
}

/**
 * JobRecoveryService: reconciles jobs left behind by a previous process.
 *
 * - PENDING jobs never reached the gate: they are scheduled again
 * - PROCESSING jobs lost their Processor mid-run: they fail with
 *   PROCESSOR_INTERRUPTED and can be resubmitted
 */
@Injectable()
export class JobRecoveryService implements OnApplicationBootstrap {
  private readonly logger = new Logger(JobRecoveryService.name);

  constructor(
    private readonly jobStore: JobStore,
    private readonly projector: ContentStatusProjector,
    private readonly orchestrator: PipelineOrchestratorService,
    private readonly tasks: BackgroundTaskRegistry,
  ) {}

  onApplicationBootstrap(): void {
    this.tasks.run('recovery:bootstrap', async () => {
      await this.recover();
    });
  }

  async recover(): Promise<RecoverySummary> {
    let interrupted = 0;
    for (const job of await this.jobStore.findByStatus(JobStatus.PROCESSING)) {
      try {
        await this.jobStore.transition(job.id, JobStatus.FAILED, {
          error: {
            code: ErrorCode.PROCESSOR_INTERRUPTED,
            message: 'Service restarted while the job was processing',
            stage: ErrorStage.PROCESSOR,
          },
        });
      } catch (error) {
        if (!(error instanceof InvalidTransitionError)) {
          throw error;
        }
        this.logger.log(`Job ${job.id} already moved to ${error.from}`);
        continue;
      }
      interrupted += 1;
      try {
        await this.projector.update(job.contentId, JobStatus.FAILED);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Could not project failed onto content ${job.contentId}: ${message}`,
        );
      }
    }

    const pending = await this.jobStore.findByStatus(JobStatus.PENDING);
    for (const job of pending) {
      this.orchestrator.schedule(job.id);
    }

    if (interrupted > 0 || pending.length > 0) {
      this.logger.log(
        `Recovered jobs: ${pending.length} rescheduled, ${interrupted} marked interrupted`,
      );
    }
    return { rescheduled: pending.length, interrupted };
  }
}

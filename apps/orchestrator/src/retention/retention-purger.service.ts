import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { DataTier } from '@jobflow/database';
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from '../config/pipeline.settings';
import { JobStore } from '../job-store/job-store';
import { BackgroundTaskRegistry } from '../tasks/background-task.registry';

const DAY_MS = 24 * 60 * 60 * 1000;

export type PurgeCounts = Record<DataTier, number>;

/**
 * RetentionPurgerService: deletes finished jobs once their tier's
 * retention window has passed.
 *
 * Runs once at bootstrap and then hourly. Tiers are purged independently:
 * a failing tier is logged and retried on the next run. A run that starts
 * while another is still in progress is skipped.
 */
@Injectable()
export class RetentionPurgerService implements OnApplicationBootstrap {
  private readonly logger = new Logger(RetentionPurgerService.name);
  private running = false;

  constructor(
    private readonly jobStore: JobStore,
    private readonly tasks: BackgroundTaskRegistry,

    @Inject(PIPELINE_SETTINGS)
    private readonly settings: PipelineSettings,
  ) {}

  onApplicationBootstrap(): void {
    this.tasks.run('retention:bootstrap', async () => {
      await this.purgeOnce();
    });
  }

  @Cron(CronExpression.EVERY_HOUR)
  async handleCron(): Promise<void> {
    await this.purgeOnce();
  }

  /** Returns the number of jobs deleted per tier; null when a run was already active */
  async purgeOnce(now: Date = new Date()): Promise<PurgeCounts | null> {
    if (this.running) {
      this.logger.warn('Previous retention run still active; skipping');
      return null;
    }

    this.running = true;
    try {
      const counts: PurgeCounts = {
        [DataTier.COMPACT]: 0,
        [DataTier.FULL]: 0,
      };

      for (const tier of Object.values(DataTier)) {
        const days = this.settings.retention.windowDays[tier];
        const cutoff = new Date(now.getTime() - days * DAY_MS);
        try {
          counts[tier] = await this.jobStore.purgeExpired(tier, cutoff);
        } catch (error) {
          const message =
            error instanceof Error ? error.message : String(error);
          this.logger.error(
            `Retention purge for tier ${tier} failed: ${message}`,
          );
          continue;
        }
        if (counts[tier] > 0) {
          this.logger.log(
            `Purged ${counts[tier]} ${tier} job(s) finished before ${cutoff.toISOString()}`,
          );
        }
      }

      return counts;
    } finally {
      this.running = false;
    }
  }
}

import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline.settings';

/** Work scheduled on the registry; `signal` aborts when the app shuts down */
export type BackgroundWork = (signal: AbortSignal) => Promise<void>;

/**
 * BackgroundTaskRegistry: owns every fire-and-forget task the service starts
 * (job executions, webhook deliveries).
 *
 * Tasks are tracked until they settle so shutdown can abort them and wait up
 * to SHUTDOWN_GRACE_MS for them to finish. A task that rejects is logged;
 * it never surfaces as an unhandled rejection.
 */
@Injectable()
export class BackgroundTaskRegistry implements OnApplicationShutdown {
  private readonly logger = new Logger(BackgroundTaskRegistry.name);
  private readonly controller = new AbortController();
  private readonly tasks = new Set<Promise<void>>();

  constructor(
    @Inject(PIPELINE_SETTINGS)
    private readonly settings: PipelineSettings,
  ) {}

  /** Number of tasks that have not settled yet */
  get size(): number {
    return this.tasks.size;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  run(name: string, work: BackgroundWork): void {
    if (this.aborted) {
      this.logger.warn(`Refusing to start task ${name}: shutting down`);
      return;
    }

    const signal = this.controller.signal;
    const task: Promise<void> = Promise.resolve()
      .then(() => work(signal))
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`Background task ${name} failed: ${message}`);
      })
      .finally(() => {
        this.tasks.delete(task);
      });

    this.tasks.add(task);
  }

  /** Resolves once every tracked task, including ones started meanwhile, has settled */
  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.controller.abort();

    if (this.tasks.size === 0) {
      return;
    }

    this.logger.log(
      `Shutdown${signal ? ` (${signal})` : ''}: waiting for ${this.tasks.size} background task(s)`,
    );

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.settings.shutdownGraceMs);
    });

    const outcome = await Promise.race([
      this.drain().then(() => 'drained' as const),
      timeout,
    ]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      this.logger.warn(
        `Shutdown grace period elapsed with ${this.tasks.size} task(s) still running`,
      );
    }
  }
}

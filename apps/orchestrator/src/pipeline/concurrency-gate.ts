import { Inject, Injectable } from '@nestjs/common';
import pLimit from 'p-limit';
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from '../config/pipeline.settings';

type Limit = ReturnType<typeof pLimit>;

/**
 * ConcurrencyGate: bounds how many job executions run at once.
 *
 * Tasks are admitted in arrival order; a slot is released when the task
 * settles, whether it resolved or rejected.
 */
@Injectable()
export class ConcurrencyGate {
  private readonly limit: Limit;

  constructor(
    @Inject(PIPELINE_SETTINGS)
    settings: PipelineSettings,
  ) {
    this.limit = pLimit(Math.max(1, Math.floor(settings.maxConcurrency)));
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return this.limit(task);
  }

  /** Tasks currently holding a slot */
  get active(): number {
    return this.limit.activeCount;
  }

  /** Tasks waiting for a slot */
  get pending(): number {
    return this.limit.pendingCount;
  }
}

import { Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { ConcurrencyGate } from '../pipeline/concurrency-gate';
import { BackgroundTaskRegistry } from '../tasks/background-task.registry';

/** Reports gate occupancy; unhealthy once shutdown has begun */
@Injectable()
export class PipelineHealthIndicator extends HealthIndicator {
  constructor(
    private readonly gate: ConcurrencyGate,
    private readonly tasks: BackgroundTaskRegistry,
  ) {
    super();
  }

  isHealthy(key: string): HealthIndicatorResult {
    const details = {
      active: this.gate.active,
      waiting: this.gate.pending,
      background_tasks: this.tasks.size,
    };

    if (this.tasks.aborted) {
      throw new HealthCheckError(
        'Pipeline is shutting down',
        this.getStatus(key, false, details),
      );
    }
    return this.getStatus(key, true, details);
  }
}

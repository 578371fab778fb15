import { Injectable } from '@nestjs/common';
import { ResultSummary } from '@jobflow/database';
import { Processor, ProcessorInput } from './processor';

/** Completes every job immediately with a summary describing it */
@Injectable()
export class NoopProcessor extends Processor {
  readonly kind = 'noop';

  async process(input: ProcessorInput): Promise<ResultSummary> {
    return {
      processor: this.kind,
      job_id: input.jobId,
      resource_key: input.resourceKey,
      pipeline_version: input.pipelineVersion,
    };
  }
}

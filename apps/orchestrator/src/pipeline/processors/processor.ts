import { DataTier, ResultSummary } from '@jobflow/database';
import { ProcessorKind } from '../../config/env.validation';

/** What a processor is told about the job it runs */
export interface ProcessorInput {
  jobId: string;
  contentId: string;
  resourceKey: string;
  pipelineVersion: string;
  dataTier: DataTier;
}

/**
 * Processor: the opaque unit of work a job runs.
 *
 * Implementations return a flat ResultSummary or throw; a
 * PipelineStageError keeps its stage and code, anything else is recorded
 * as PROCESSOR_ERROR.
 */
export abstract class Processor {
  abstract readonly kind: ProcessorKind;

  abstract process(input: ProcessorInput): Promise<ResultSummary>;
}

import { ErrorCode, ErrorStage } from '@jobflow/database';

/**
 * Classified failure of one pipeline stage. The orchestrator records
 * `stage`, `code` and `message` on the failed job.
 */
export class PipelineStageError extends Error {
  constructor(
    readonly stage: ErrorStage,
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'PipelineStageError';
  }
}

/** Maps anything a processor throws onto a stage error */
export function classifyProcessorError(error: unknown): PipelineStageError {
  if (error instanceof PipelineStageError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineStageError(
    ErrorStage.PROCESSOR,
    ErrorCode.PROCESSOR_ERROR,
    message || 'Processor failed without a message',
  );
}

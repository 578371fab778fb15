import { Inject, Injectable, Logger } from '@nestjs/common';
import { ErrorCode, ErrorStage, ResultSummary } from '@jobflow/database';
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from '../../config/pipeline.settings';
import { PipelineStageError } from '../pipeline-stage.error';
import { isResultSummary } from '../result-summary.validation';
import { Processor, ProcessorInput } from './processor';

/**
 * HttpProcessor: delegates the work to an external service.
 *
 * POST {PROCESSOR_URL}
 *   { job_id, content_id, resource_key, pipeline_version, data_tier }
 * → 2xx { result: { ...flat summary } }
 *
 * A request exceeding PROCESSOR_TIMEOUT_MS fails with PROCESSOR_TIMEOUT;
 * transport errors and non-2xx responses with PROCESSOR_ERROR; a response
 * without a usable `result` with VALIDATION_FAILED.
 */
@Injectable()
export class HttpProcessor extends Processor {
  readonly kind = 'http';
  private readonly logger = new Logger(HttpProcessor.name);

  constructor(
    @Inject(PIPELINE_SETTINGS)
    private readonly settings: PipelineSettings,
  ) {
    super();
  }

  async process(input: ProcessorInput): Promise<ResultSummary> {
    const { url, timeoutMs } = this.settings.processor;
    if (!url) {
      throw new PipelineStageError(
        ErrorStage.PROCESSOR,
        ErrorCode.PROCESSOR_ERROR,
        'PROCESSOR_URL is not configured',
      );
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    let body: unknown;
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          job_id: input.jobId,
          content_id: input.contentId,
          resource_key: input.resourceKey,
          pipeline_version: input.pipelineVersion,
          data_tier: input.dataTier,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new PipelineStageError(
          ErrorStage.PROCESSOR,
          ErrorCode.PROCESSOR_ERROR,
          `Processor responded with HTTP ${response.status}`,
        );
      }

      body = await response.json();
    } catch (error) {
      if (error instanceof PipelineStageError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new PipelineStageError(
          ErrorStage.PROCESSOR,
          ErrorCode.PROCESSOR_TIMEOUT,
          `Processor did not respond within ${timeoutMs} ms`,
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Processor request for job ${input.jobId} failed: ${message}`);
      throw new PipelineStageError(
        ErrorStage.PROCESSOR,
        ErrorCode.PROCESSOR_ERROR,
        `Processor request failed: ${message}`,
      );
    } finally {
      clearTimeout(timer);
    }

    const result =
      typeof body === 'object' && body !== null && 'result' in body
        ? body.result
        : undefined;

    if (!isResultSummary(result)) {
      throw new PipelineStageError(
        ErrorStage.VALIDATION,
        ErrorCode.VALIDATION_FAILED,
        'Processor response has no result summary',
      );
    }
    return result;
  }
}

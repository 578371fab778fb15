import { ConfigService } from '@nestjs/config';
import { DataTier } from '@jobflow/database';
import { ProcessorKind } from './env.validation';

/** Injection token for the typed {@link PipelineSettings} object */
export const PIPELINE_SETTINGS = Symbol('PIPELINE_SETTINGS');

export interface ProcessorSettings {
  kind: ProcessorKind;
  url: string | null;
  timeoutMs: number;
}

/**
 * Webhook delivery settings. `url` and `secret` are both null when
 * delivery is disabled; a half-configured pair counts as disabled.
 */
export interface CallbackSettings {
  url: string | null;
  secret: string | null;
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
}

export interface RetentionSettings {
  /** Retention window per tier, in days after finished_at */
  windowDays: Record<DataTier, number>;
}

export interface PipelineSettings {
  pipelineVersion: string;
  maxConcurrency: number;
  defaultDataTier: DataTier;
  processor: ProcessorSettings;
  callback: CallbackSettings;
  retention: RetentionSettings;
  shutdownGraceMs: number;
}

/**
 * Builds the typed settings object from the validated environment.
 * Values are already coerced by `validateEnvironment`.
 */
export function loadPipelineSettings(config: ConfigService): PipelineSettings {
  const callbackUrl = config.get<string>('CALLBACK_URL') ?? null;
  const callbackSecret = config.get<string>('CALLBACK_SECRET') ?? null;
  const callbackEnabled = Boolean(callbackUrl && callbackSecret);

  return {
    pipelineVersion: config.get<string>('PIPELINE_VERSION', '0.1.0'),
    maxConcurrency: config.get<number>('PIPELINE_MAX_CONCURRENCY', 4),
    defaultDataTier: config.get<DataTier>(
      'PIPELINE_DEFAULT_DATA_TIER',
      DataTier.COMPACT,
    ),
    processor: {
      kind: config.get<ProcessorKind>('PROCESSOR_KIND', 'noop'),
      url: config.get<string>('PROCESSOR_URL') ?? null,
      timeoutMs: config.get<number>('PROCESSOR_TIMEOUT_MS', 120_000),
    },
    callback: {
      url: callbackEnabled ? callbackUrl : null,
      secret: callbackEnabled ? callbackSecret : null,
      timeoutMs: config.get<number>('CALLBACK_TIMEOUT_MS', 10_000),
      maxAttempts: config.get<number>('CALLBACK_MAX_ATTEMPTS', 3),
      backoffBaseMs: config.get<number>('CALLBACK_BACKOFF_BASE_MS', 1_000),
    },
    retention: {
      windowDays: {
        [DataTier.COMPACT]: config.get<number>('RETENTION_COMPACT_DAYS', 180),
        [DataTier.FULL]: config.get<number>('RETENTION_FULL_DAYS', 60),
      },
    },
    shutdownGraceMs: config.get<number>('SHUTDOWN_GRACE_MS', 30_000),
  };
}

import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  MinLength,
  ValidateIf,
  validateSync,
} from 'class-validator';
import { DataTier } from '@jobflow/database';

export const PROCESSOR_KINDS = ['noop', 'http'] as const;
export type ProcessorKind = (typeof PROCESSOR_KINDS)[number];

/**
 * Environment contract for the orchestrator.
 *
 * Every variable has a default so the service boots with an empty
 * environment against a local database; anything that is set must be
 * well-formed or startup fails with the full list of problems.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV: string = 'development';

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 4000;

  // ── Database ────────────────────────────────────────────

  @IsString()
  POSTGRES_HOST: string = 'localhost';

  @IsInt()
  @Min(1)
  @Max(65535)
  POSTGRES_PORT: number = 5432;

  @IsString()
  POSTGRES_USER: string = 'jobflow';

  @IsString()
  POSTGRES_PASSWORD: string = 'jobflow_secret';

  @IsString()
  POSTGRES_DB: string = 'jobflow';

  // ── Pipeline ────────────────────────────────────────────

  @IsString()
  @MinLength(1)
  PIPELINE_VERSION: string = '0.1.0';

  @IsInt()
  @Min(1)
  @Max(64)
  PIPELINE_MAX_CONCURRENCY: number = 4;

  @IsEnum(DataTier)
  PIPELINE_DEFAULT_DATA_TIER: DataTier = DataTier.COMPACT;

  @IsIn(PROCESSOR_KINDS)
  PROCESSOR_KIND: ProcessorKind = 'noop';

  @ValidateIf((env: EnvironmentVariables) => env.PROCESSOR_KIND === 'http')
  @IsUrl({ require_tld: false })
  PROCESSOR_URL?: string;

  @IsInt()
  @Min(1)
  PROCESSOR_TIMEOUT_MS: number = 120_000;

  // ── Callbacks ───────────────────────────────────────────

  @IsOptional()
  @IsUrl({ require_tld: false })
  CALLBACK_URL?: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  CALLBACK_SECRET?: string;

  @IsInt()
  @Min(1)
  CALLBACK_TIMEOUT_MS: number = 10_000;

  @IsInt()
  @Min(1)
  @Max(10)
  CALLBACK_MAX_ATTEMPTS: number = 3;

  @IsInt()
  @Min(0)
  CALLBACK_BACKOFF_BASE_MS: number = 1_000;

  // ── Retention ───────────────────────────────────────────

  @IsInt()
  @Min(1)
  RETENTION_COMPACT_DAYS: number = 180;

  @IsInt()
  @Min(1)
  RETENTION_FULL_DAYS: number = 60;

  @IsInt()
  @Min(0)
  SHUTDOWN_GRACE_MS: number = 30_000;
}

/**
 * ConfigModule `validate` hook.
 *
 * Coerces string env values to the declared property types, applies the
 * class defaults for missing keys and throws when any constraint fails.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const issues = errors.map((error) => {
      const constraints = Object.values(error.constraints ?? {}).join(', ');
      return `${error.property}: ${constraints}`;
    });
    throw new Error(
      `Invalid environment configuration. Fix the following: ${issues.join('; ')}`,
    );
  }

  return validated;
}

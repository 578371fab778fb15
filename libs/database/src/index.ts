// ── Entities ────────────────────────────────────────────────
export { Content } from './entities/content.entity';
export { PipelineJob } from './entities/pipeline-job.entity';

// ── Enums ───────────────────────────────────────────────────
export {
  JobStatus,
  TERMINAL_JOB_STATUSES,
  ACTIVE_JOB_STATUSES,
  isTerminalStatus,
} from './enums/job-status.enum';
export { DataTier } from './enums/data-tier.enum';
export { ErrorStage, ErrorCode } from './enums/error-stage.enum';

// ── Types ───────────────────────────────────────────────────
export type {
  SummaryValue,
  ResultSummary,
  JobMetadata,
} from './types/result-summary';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule, DATABASE_ENTITIES } from './database.module';

import { DataTier, ErrorStage, JobMetadata, JobStatus } from '@jobflow/database';

/** Minimal job view returned by GET /jobs and GET /jobs/:jobId */
export class JobStatusResponseDto {
  job_id!: string;
  content_id!: string;
  status!: JobStatus;

  /** ISO-8601 timestamps; null until the job reaches that point */
  created_at!: string;
  started_at!: string | null;
  finished_at!: string | null;
}

/** GET /jobs/:jobId?verbose=true */
export class JobDetailResponseDto extends JobStatusResponseDto {
  error_code!: string | null;
  error_message!: string | null;
  error_stage!: ErrorStage | null;
  resource_key!: string;
  pipeline_version!: string;
  data_tier!: DataTier;
  metadata!: JobMetadata | null;
}

export class JobListResponseDto {
  jobs!: JobStatusResponseDto[];

  /** Count of all jobs matching the filters, ignoring limit/offset */
  total!: number;
}

export class CancelJobResponseDto {
  job_id!: string;
  status!: JobStatus;

  /** true only when this request moved the job to cancelled */
  cancelled!: boolean;
  message!: string;
}

import { createHmac } from 'node:crypto';
import { v5 as uuidv5 } from 'uuid';
import { PipelineJob, ResultSummary } from '@jobflow/database';

export const CALLBACK_SCHEMA_VERSION = '1';

/** UUIDv5 namespace for callback event ids; changing it changes every event id */
export const CALLBACK_EVENT_NAMESPACE = '3f8c2b6e-9d41-4c7a-8e25-b71a0d6f4c93';

export const SIGNATURE_HEADER = 'X-Jobflow-Signature';
export const EVENT_ID_HEADER = 'X-Jobflow-Event-Id';

export interface CallbackPayload {
  schema_version: typeof CALLBACK_SCHEMA_VERSION;
  event_id: string;
  job_id: string;
  content_id: string;
  resource_key: string;
  status: string;
  pipeline_version: string;
  result?: ResultSummary;
  error_code?: string;
  error_message?: string;
}

/** Same job id, same event id: receivers deduplicate retries on it */
export function callbackEventId(jobId: string): string {
  return uuidv5(jobId, CALLBACK_EVENT_NAMESPACE);
}

export function buildCallbackPayload(
  job: PipelineJob,
  summary: ResultSummary | null,
): CallbackPayload {
  const payload: CallbackPayload = {
    schema_version: CALLBACK_SCHEMA_VERSION,
    event_id: callbackEventId(job.id),
    job_id: job.id,
    content_id: job.contentId,
    resource_key: job.resourceKey,
    status: job.status,
    pipeline_version: job.pipelineVersion,
  };
  if (summary && Object.keys(summary).length > 0) {
    payload.result = summary;
  }
  if (job.errorCode) {
    payload.error_code = job.errorCode;
  }
  if (job.errorMessage) {
    payload.error_message = job.errorMessage;
  }
  return payload;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, nested]) => [key, sortKeys(nested)]),
    );
  }
  return value;
}

/** JSON with object keys sorted at every level and no whitespace */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

/** Hex HMAC-SHA256 of the exact body bytes sent */
export function signBody(body: string, secret: string): string {
  return createHmac('sha256', secret).update(body, 'utf8').digest('hex');
}

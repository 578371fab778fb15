import { Inject, Injectable, Logger } from '@nestjs/common';
import { setTimeout as sleep } from 'node:timers/promises';
import { PipelineJob, ResultSummary } from '@jobflow/database';
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from '../config/pipeline.settings';
import {
  EVENT_ID_HEADER,
  SIGNATURE_HEADER,
  buildCallbackPayload,
  canonicalJson,
  signBody,
} from './callback-payload';

/** Factor applied to the backoff delay after every failed attempt */
const BACKOFF_FACTOR = 4;

export interface DeliveryOutcome {
  delivered: boolean;
  attempts: number;
  eventId: string;
}

/** Delay slept after failed attempt `attempt` (1-based) */
export function backoffDelayMs(attempt: number, baseMs: number): number {
  const exp = Math.max(1, Math.floor(attempt)) - 1;
  return baseMs * Math.pow(BACKOFF_FACTOR, exp);
}

/**
 * CallbackDispatcher: delivers signed webhook notifications for finished jobs.
 *
 * - body is canonical JSON, signed with HMAC-SHA256 (hex) in X-Jobflow-Signature
 * - X-Jobflow-Event-Id carries the event id so receivers can drop replays
 * - up to CALLBACK_MAX_ATTEMPTS attempts, each bounded by CALLBACK_TIMEOUT_MS;
 *   non-2xx responses and transport errors count as failures
 * - sleeps base·4^(n-1) after failed attempt n, never after the last one
 *
 * Delivery outcome is logged as an audit event. It never touches job state
 * and never throws for delivery failures.
 */
@Injectable()
export class CallbackDispatcher {
  private readonly logger = new Logger(CallbackDispatcher.name);

  constructor(
    @Inject(PIPELINE_SETTINGS)
    private readonly settings: PipelineSettings,
  ) {}

  get enabled(): boolean {
    return Boolean(this.settings.callback.url && this.settings.callback.secret);
  }

  /**
   * Returns null when delivery is disabled. `signal` interrupts the backoff
   * sleep and prevents further attempts.
   */
  async notify(
    job: PipelineJob,
    summary: ResultSummary | null,
    signal?: AbortSignal,
  ): Promise<DeliveryOutcome | null> {
    const { url, secret, maxAttempts, backoffBaseMs } = this.settings.callback;
    if (!url || !secret) {
      return null;
    }

    const payload = buildCallbackPayload(job, summary);
    const body = canonicalJson(payload);
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      [SIGNATURE_HEADER]: signBody(body, secret),
      [EVENT_ID_HEADER]: payload.event_id,
    };

    let attempts = 0;
    while (attempts < maxAttempts && !signal?.aborted) {
      attempts += 1;
      const failure = await this.attempt(url, body, headers);

      if (failure === null) {
        this.logger.log(
          `audit.callback_delivery job_id=${job.id} event_id=${payload.event_id} attempt=${attempts} success=true`,
        );
        return { delivered: true, attempts, eventId: payload.event_id };
      }

      this.logger.warn(
        `Callback attempt ${attempts}/${maxAttempts} failed for job ${job.id}: ${failure}`,
      );

      if (attempts < maxAttempts) {
        const interrupted = await this.backoff(attempts, backoffBaseMs, signal);
        if (interrupted) {
          break;
        }
      }
    }

    this.logger.error(
      `audit.callback_delivery job_id=${job.id} event_id=${payload.event_id} attempt=${attempts} success=false`,
    );
    return { delivered: false, attempts, eventId: payload.event_id };
  }

  // ── Private helpers ──────────────────────────────────────

  /** Resolves to null on success, otherwise to a failure description */
  private async attempt(
    url: string,
    body: string,
    headers: Record<string, string>,
  ): Promise<string | null> {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(),
      this.settings.callback.timeoutMs,
    );

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });
      // The body is never read; release the connection
      await response.body?.cancel();
      return response.ok ? null : `HTTP ${response.status}`;
    } catch (error) {
      if (controller.signal.aborted) {
        return `timed out after ${this.settings.callback.timeoutMs} ms`;
      }
      return error instanceof Error ? error.message : String(error);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Resolves to true when `signal` aborted the sleep */
  private async backoff(
    attempt: number,
    baseMs: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    try {
      await sleep(backoffDelayMs(attempt, baseMs), undefined, { signal });
      return false;
    } catch (error) {
      if (signal?.aborted) {
        this.logger.warn('Callback retries interrupted by shutdown');
        return true;
      }
      throw error;
    }
  }
}

import { randomUUID } from 'node:crypto';
import { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import request from 'supertest';
import { DataSource } from 'typeorm';
import { DataTier, JobStatus } from '@jobflow/database';
import { FEATURE_MODULES } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { validateEnvironment } from '../src/config/env.validation';
import { PIPELINE_SETTINGS } from '../src/config/pipeline.settings';
import { SettingsModule } from '../src/config/settings.module';
import { BackgroundTaskRegistry } from '../src/tasks/background-task.registry';
import { buildTestSettings } from './utils/test-settings';
import { seedContent, seedJob, sqliteOptions } from './utils/test-database';
import { silenceLogger } from './utils/silence-logger';

describe('Jobs API (e2e)', () => {
  let app: INestApplication;
  let dataSource: DataSource;
  let tasks: BackgroundTaskRegistry;

  beforeEach(async () => {
    silenceLogger();

    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          validate: validateEnvironment,
        }),
        TypeOrmModule.forRoot(sqliteOptions()),
        SettingsModule,
        ...FEATURE_MODULES,
      ],
    })
      .overrideProvider(PIPELINE_SETTINGS)
      .useValue(buildTestSettings())
      .compile();

    app = moduleRef.createNestApplication();
    configureApp(app);
    await app.init();

    dataSource = app.get(DataSource);
    tasks = app.get(BackgroundTaskRegistry);
    // Recovery and retention run once on bootstrap
    await tasks.drain();
  });

  afterEach(async () => {
    await app.close();
    jest.restoreAllMocks();
  });

  describe('POST /content/:contentId/reprocess', () => {
    it('submits a job that the noop processor completes', async () => {
      const content = await seedContent(dataSource);

      const response = await request(app.getHttpServer())
        .post(`/content/${content.id}/reprocess`)
        .expect(200);

      expect(response.body).toEqual({
        job_id: expect.any(String),
        content_id: content.id,
        status: 'submitted',
      });

      await tasks.drain();

      const job = await request(app.getHttpServer())
        .get(`/jobs/${response.body.job_id}`)
        .expect(200);
      expect(job.body.status).toBe(JobStatus.COMPLETED);
      expect(job.body.started_at).toEqual(expect.any(String));
      expect(job.body.finished_at).toEqual(expect.any(String));
    });

    it('joins the active job for the same resource', async () => {
      const content = await seedContent(dataSource);
      const active = await seedJob(dataSource, content.id, {
        status: JobStatus.PROCESSING,
        startedAt: new Date(),
      });

      const response = await request(app.getHttpServer())
        .post(`/content/${content.id}/reprocess`)
        .expect(200);

      expect(response.body).toEqual({
        job_id: active.id,
        content_id: content.id,
        status: 'already_active',
      });
    });

    it('reports completed content unless force is set', async () => {
      const content = await seedContent(dataSource, {
        processingStatus: JobStatus.COMPLETED,
        pipelineVersion: '0.1.0',
      });

      const skipped = await request(app.getHttpServer())
        .post(`/content/${content.id}/reprocess`)
        .expect(200);
      expect(skipped.body).toEqual({
        job_id: null,
        content_id: content.id,
        status: 'already_completed',
      });

      const forced = await request(app.getHttpServer())
        .post(`/content/${content.id}/reprocess?force=true`)
        .expect(200);
      expect(forced.body.status).toBe('submitted');
      expect(forced.body.job_id).toEqual(expect.any(String));
    });

    it('replays the original job for a repeated Idempotency-Key', async () => {
      const content = await seedContent(dataSource);

      const first = await request(app.getHttpServer())
        .post(`/content/${content.id}/reprocess`)
        .set('Idempotency-Key', 'retry-1')
        .expect(200);
      await tasks.drain();

      const replay = await request(app.getHttpServer())
        .post(`/content/${content.id}/reprocess?force=true`)
        .set('Idempotency-Key', 'retry-1')
        .expect(200);

      expect(replay.body).toEqual({
        job_id: first.body.job_id,
        content_id: content.id,
        status: 'submitted',
      });
    });

    it('applies the requested data tier', async () => {
      const content = await seedContent(dataSource);

      const response = await request(app.getHttpServer())
        .post(`/content/${content.id}/reprocess?tier=full`)
        .expect(200);
      await tasks.drain();

      const detail = await request(app.getHttpServer())
        .get(`/jobs/${response.body.job_id}?verbose=true`)
        .expect(200);
      expect(detail.body.data_tier).toBe(DataTier.FULL);
      expect(detail.body.metadata).toEqual({
        processor: 'noop',
        duration_ms: expect.any(Number),
        summary_fields: 4,
      });
    });

    it('rejects an oversized Idempotency-Key', async () => {
      const content = await seedContent(dataSource);

      const response = await request(app.getHttpServer())
        .post(`/content/${content.id}/reprocess`)
        .set('Idempotency-Key', 'k'.repeat(256))
        .expect(400);
      expect(response.body.message).toBe(
        'Idempotency-Key must be 1 to 255 characters',
      );
    });

    it('rejects a malformed source URL', async () => {
      const content = await seedContent(dataSource, {
        sourceUrl: 'ftp://files.example.com/report.pdf',
      });

      await request(app.getHttpServer())
        .post(`/content/${content.id}/reprocess`)
        .expect(400);
    });

    it('rejects an unknown tier', async () => {
      const content = await seedContent(dataSource);

      await request(app.getHttpServer())
        .post(`/content/${content.id}/reprocess?tier=archive`)
        .expect(400);
    });

    it('returns 404 for unknown content', async () => {
      const contentId = randomUUID();

      const response = await request(app.getHttpServer())
        .post(`/content/${contentId}/reprocess`)
        .expect(404);
      expect(response.body).toEqual({
        statusCode: 404,
        error: 'Not Found',
        message: `Content ${contentId} not found`,
      });
    });
  });

  describe('GET /jobs/:jobId', () => {
    it('returns the minimal view by default', async () => {
      const content = await seedContent(dataSource);
      const createdAt = new Date('2026-01-02T03:04:05.000Z');
      const job = await seedJob(dataSource, content.id, { createdAt });

      const response = await request(app.getHttpServer())
        .get(`/jobs/${job.id}`)
        .expect(200);

      expect(response.body).toEqual({
        job_id: job.id,
        content_id: content.id,
        status: JobStatus.PENDING,
        created_at: '2026-01-02T03:04:05.000Z',
        started_at: null,
        finished_at: null,
      });
    });

    it('adds error and resource detail when verbose', async () => {
      const content = await seedContent(dataSource);
      const job = await seedJob(dataSource, content.id, {
        status: JobStatus.FAILED,
        errorCode: 'PROCESSOR_ERROR',
        errorMessage: 'Processor responded with HTTP 502',
        finishedAt: new Date(),
      });

      const response = await request(app.getHttpServer())
        .get(`/jobs/${job.id}?verbose=true`)
        .expect(200);

      expect(response.body).toMatchObject({
        job_id: job.id,
        status: JobStatus.FAILED,
        error_code: 'PROCESSOR_ERROR',
        error_message: 'Processor responded with HTTP 502',
        error_stage: null,
        resource_key: `cid:${content.id}`,
        pipeline_version: '0.1.0',
        data_tier: DataTier.COMPACT,
        metadata: null,
      });
    });

    it('returns 404 for an unknown job', async () => {
      await request(app.getHttpServer())
        .get(`/jobs/${randomUUID()}`)
        .expect(404);
    });

    it('returns 400 for a malformed id', async () => {
      await request(app.getHttpServer()).get('/jobs/not-a-uuid').expect(400);
    });
  });

  describe('GET /jobs', () => {
    it('filters by status and pages with limit', async () => {
      const content = await seedContent(dataSource);
      await seedJob(dataSource, content.id, {
        status: JobStatus.FAILED,
        createdAt: new Date('2026-01-01T00:00:00.000Z'),
        finishedAt: new Date('2026-01-01T00:01:00.000Z'),
      });
      const newest = await seedJob(dataSource, content.id, {
        status: JobStatus.FAILED,
        createdAt: new Date('2026-01-03T00:00:00.000Z'),
        finishedAt: new Date('2026-01-03T00:01:00.000Z'),
      });
      await seedJob(dataSource, content.id, {
        status: JobStatus.PENDING,
        createdAt: new Date('2026-01-02T00:00:00.000Z'),
      });

      const response = await request(app.getHttpServer())
        .get('/jobs?status=failed&limit=1')
        .expect(200);

      expect(response.body.total).toBe(2);
      expect(response.body.jobs).toHaveLength(1);
      expect(response.body.jobs[0].job_id).toBe(newest.id);
    });

    it('rejects an unknown status', async () => {
      const response = await request(app.getHttpServer())
        .get('/jobs?status=queued')
        .expect(400);
      expect(response.body.message).toEqual([
        'status must be one of: pending, processing, completed, failed, cancelled',
      ]);
    });

    it('rejects a limit above 100', async () => {
      await request(app.getHttpServer()).get('/jobs?limit=101').expect(400);
    });
  });

  describe('POST /jobs/:jobId/cancel', () => {
    it('cancels a pending job', async () => {
      const content = await seedContent(dataSource);
      const job = await seedJob(dataSource, content.id);

      const response = await request(app.getHttpServer())
        .post(`/jobs/${job.id}/cancel`)
        .expect(200);

      expect(response.body).toEqual({
        job_id: job.id,
        status: JobStatus.CANCELLED,
        cancelled: true,
        message: 'Job cancelled',
      });
    });

    it('flags a processing job for cancellation', async () => {
      const content = await seedContent(dataSource);
      const job = await seedJob(dataSource, content.id, {
        status: JobStatus.PROCESSING,
        startedAt: new Date(),
      });

      const response = await request(app.getHttpServer())
        .post(`/jobs/${job.id}/cancel`)
        .expect(200);

      expect(response.body).toEqual({
        job_id: job.id,
        status: JobStatus.PROCESSING,
        cancelled: false,
        message:
          'Cancellation requested; best effort, it only takes effect if the processor has not started yet',
      });
    });

    it('leaves terminal jobs untouched', async () => {
      const content = await seedContent(dataSource);
      const job = await seedJob(dataSource, content.id, {
        status: JobStatus.COMPLETED,
        finishedAt: new Date(),
      });

      const response = await request(app.getHttpServer())
        .post(`/jobs/${job.id}/cancel`)
        .expect(200);

      expect(response.body).toEqual({
        job_id: job.id,
        status: JobStatus.COMPLETED,
        cancelled: false,
        message: 'Job already in a terminal state',
      });
    });

    it('returns 404 for an unknown job', async () => {
      await request(app.getHttpServer())
        .post(`/jobs/${randomUUID()}/cancel`)
        .expect(404);
    });
  });

  describe('GET /jobs/drift', () => {
    it('counts stale and unknown versions', async () => {
      await seedContent(dataSource, { pipelineVersion: '0.1.3' });
      await seedContent(dataSource, { pipelineVersion: '0.0.9' });
      await seedContent(dataSource, { pipelineVersion: '0.0.9' });
      await seedContent(dataSource, { pipelineVersion: null });

      const response = await request(app.getHttpServer())
        .get('/jobs/drift')
        .expect(200);

      expect(response.body).toEqual({
        current_version: '0.1.0',
        stale_content: [{ version: '0.0.9', count: 2 }],
        total_stale: 2,
        unknown_version_count: 1,
        total_content: 4,
      });
    });
  });

  describe('GET /health', () => {
    it('reports the database and pipeline as up', async () => {
      const response = await request(app.getHttpServer())
        .get('/health')
        .expect(200);

      expect(response.body.status).toBe('ok');
      expect(response.body.info.database).toEqual({ status: 'up' });
      expect(response.body.info.pipeline).toEqual({
        status: 'up',
        active: 0,
        waiting: 0,
        background_tasks: 0,
      });
    });
  });
});

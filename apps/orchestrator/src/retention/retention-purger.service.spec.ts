import { DataSource } from 'typeorm';
import { DataTier, JobStatus, PipelineJob } from '@jobflow/database';
import { RetentionPurgerService } from './retention-purger.service';
import { TypeOrmJobStore } from '../job-store/typeorm-job-store';
import { BackgroundTaskRegistry } from '../tasks/background-task.registry';
import {
  createTestDataSource,
  daysAgo,
  seedContent,
  seedJob,
} from '../../test/utils/test-database';
import { buildTestSettings } from '../../test/utils/test-settings';
import { silenceLogger } from '../../test/utils/silence-logger';

describe('RetentionPurgerService', () => {
  const now = new Date('2026-09-01T12:00:00Z');
  const settings = buildTestSettings();

  let dataSource: DataSource;
  let store: TypeOrmJobStore;
  let tasks: BackgroundTaskRegistry;
  let purger: RetentionPurgerService;
  let contentId: string;

  const finishedJob = (key: string, tier: DataTier, ageDays: number) =>
    seedJob(dataSource, contentId, {
      resourceKey: key,
      status: JobStatus.COMPLETED,
      dataTier: tier,
      finishedAt: daysAgo(ageDays, now),
    });

  const remainingKeys = async () =>
    (await dataSource.getRepository(PipelineJob).find())
      .map((job) => job.resourceKey)
      .sort();

  beforeEach(async () => {
    silenceLogger();
    dataSource = await createTestDataSource();
    store = new TypeOrmJobStore(dataSource.getRepository(PipelineJob));
    tasks = new BackgroundTaskRegistry(settings);
    purger = new RetentionPurgerService(store, tasks, settings);
    contentId = (await seedContent(dataSource)).id;
  });

  afterEach(async () => {
    await tasks.drain();
    await dataSource.destroy();
    jest.restoreAllMocks();
  });

  it('applies each tier its own window', async () => {
    await finishedJob('full-61', DataTier.FULL, 61);
    await finishedJob('full-59', DataTier.FULL, 59);
    await finishedJob('compact-181', DataTier.COMPACT, 181);
    await finishedJob('compact-179', DataTier.COMPACT, 179);
    await finishedJob('compact-61', DataTier.COMPACT, 61);

    await expect(purger.purgeOnce(now)).resolves.toEqual({
      compact: 1,
      full: 1,
    });
    expect(await remainingKeys()).toEqual([
      'compact-179',
      'compact-61',
      'full-59',
    ]);
  });

  it('is idempotent', async () => {
    await finishedJob('full-90', DataTier.FULL, 90);

    await purger.purgeOnce(now);
    await expect(purger.purgeOnce(now)).resolves.toEqual({
      compact: 0,
      full: 0,
    });
  });

  it('keeps purging other tiers when one fails', async () => {
    await finishedJob('full-90', DataTier.FULL, 90);
    const purgeExpired = store.purgeExpired.bind(store);
    jest
      .spyOn(store, 'purgeExpired')
      .mockImplementation(async (tier, cutoff) => {
        if (tier === DataTier.COMPACT) {
          throw new Error('statement timeout');
        }
        return purgeExpired(tier, cutoff);
      });

    await expect(purger.purgeOnce(now)).resolves.toEqual({
      compact: 0,
      full: 1,
    });
  });

  it('skips a run while another is in progress', async () => {
    let release: () => void = () => undefined;
    jest.spyOn(store, 'purgeExpired').mockImplementation(
      () =>
        new Promise<number>((resolve) => {
          release = () => resolve(0);
        }),
    );

    const first = purger.purgeOnce(now);
    await expect(purger.purgeOnce(now)).resolves.toBeNull();

    release();
    await new Promise((resolve) => setImmediate(resolve));
    release();
    await expect(first).resolves.toEqual({ compact: 0, full: 0 });
  });

  it('runs once at bootstrap', async () => {
    await finishedJob('full-400', DataTier.FULL, 400);

    purger.onApplicationBootstrap();
    await tasks.drain();

    expect(await remainingKeys()).toEqual([]);
  });
});

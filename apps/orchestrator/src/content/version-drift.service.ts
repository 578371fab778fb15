import { Inject, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Content } from '@jobflow/database';
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from '../config/pipeline.settings';
import { hasVersionDrift, parseVersion } from './version.utils';

export interface StaleVersionCount {
  version: string;
  count: number;
}

export interface VersionDriftReport {
  currentVersion: string;
  staleContent: StaleVersionCount[];
  totalStale: number;
  unknownVersionCount: number;
  totalContent: number;
}

interface VersionCountRow {
  version: string | null;
  count: string | number;
}

/**
 * VersionDriftService: reports how much content was produced by a pipeline
 * version whose major/minor differs from the one currently running.
 *
 * Content with no version or a version that is not MAJOR.MINOR.PATCH is
 * counted as unknown, never as stale.
 */
@Injectable()
export class VersionDriftService {
  constructor(
    @InjectRepository(Content)
    private readonly contentRepository: Repository<Content>,

    @Inject(PIPELINE_SETTINGS)
    private readonly settings: PipelineSettings,
  ) {}

  async report(): Promise<VersionDriftReport> {
    const rows = await this.contentRepository
      .createQueryBuilder('content')
      .select('content.pipelineVersion', 'version')
      .addSelect('COUNT(*)', 'count')
      .groupBy('content.pipelineVersion')
      .getRawMany<VersionCountRow>();

    const currentVersion = this.settings.pipelineVersion;
    const staleContent: StaleVersionCount[] = [];
    let unknownVersionCount = 0;
    let totalContent = 0;

    for (const row of rows) {
      const count = Number(row.count);
      totalContent += count;

      if (parseVersion(row.version) === null) {
        unknownVersionCount += count;
      } else if (row.version && hasVersionDrift(row.version, currentVersion)) {
        staleContent.push({ version: row.version, count });
      }
    }

    staleContent.sort(
      (a, b) => b.count - a.count || a.version.localeCompare(b.version),
    );

    return {
      currentVersion,
      staleContent,
      totalStale: staleContent.reduce((sum, entry) => sum + entry.count, 0),
      unknownVersionCount,
      totalContent,
    };
  }
}

import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { Content, JobStatus, ResultSummary } from '@jobflow/database';
import { ContentStatusProjector } from './content-status.projector';

@Injectable()
export class TypeOrmContentStatusProjector extends ContentStatusProjector {
  constructor(
    @InjectRepository(Content)
    private readonly contentRepository: Repository<Content>,
  ) {
    super();
  }

  async update(
    contentId: string,
    status: JobStatus,
    pipelineVersion?: string,
  ): Promise<void> {
    const patch: QueryDeepPartialEntity<Content> = { processingStatus: status };
    if (pipelineVersion !== undefined) {
      patch.pipelineVersion = pipelineVersion;
    }
    await this.contentRepository.update({ id: contentId }, patch);
  }

  async recordResult(
    contentId: string,
    summary: ResultSummary,
    pipelineVersion: string,
  ): Promise<void> {
    await this.contentRepository.update(
      { id: contentId },
      {
        processingResult: summary,
        pipelineVersion,
        processedAt: new Date(),
      },
    );
  }
}

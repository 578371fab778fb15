import { Module } from '@nestjs/common';
import { DatabaseModule } from '@jobflow/database';
import { PipelineModule } from '../pipeline/pipeline.module';
import { ContentModule } from '../content/content.module';
import { JobsController } from './jobs.controller';
import { ContentReprocessController } from './content-reprocess.controller';
import { JobsService } from './jobs.service';

@Module({
  imports: [DatabaseModule.forFeature(), PipelineModule, ContentModule],
  controllers: [JobsController, ContentReprocessController],
  providers: [JobsService],
})
export class JobsModule {}

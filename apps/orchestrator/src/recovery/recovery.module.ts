import { Module } from '@nestjs/common';
import { PipelineModule } from '../pipeline/pipeline.module';
import { ContentModule } from '../content/content.module';
import { JobRecoveryService } from './job-recovery.service';

@Module({
  imports: [PipelineModule, ContentModule],
  providers: [JobRecoveryService],
})
export class RecoveryModule {}

import { Module } from '@nestjs/common';
import { TasksModule } from '../tasks/tasks.module';
import { ResourceKeyModule } from '../resource-key/resource-key.module';
import { JobStoreModule } from '../job-store/job-store.module';
import { ContentModule } from '../content/content.module';
import { CallbacksModule } from '../callbacks/callbacks.module';
import { ConcurrencyGate } from './concurrency-gate';
import { PipelineOrchestratorService } from './pipeline-orchestrator.service';
import { processorProvider } from './processors/processor.provider';

@Module({
  imports: [
    TasksModule,
    ResourceKeyModule,
    JobStoreModule,
    ContentModule,
    CallbacksModule,
  ],
  providers: [ConcurrencyGate, processorProvider, PipelineOrchestratorService],
  exports: [
    PipelineOrchestratorService,
    ConcurrencyGate,
    JobStoreModule,
    TasksModule,
  ],
})
export class PipelineModule {}

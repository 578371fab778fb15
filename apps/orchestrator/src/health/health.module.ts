import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { PipelineModule } from '../pipeline/pipeline.module';
import { HealthController } from './health.controller';
import { PipelineHealthIndicator } from './pipeline.health';

@Module({
  imports: [TerminusModule, PipelineModule],
  controllers: [HealthController],
  providers: [PipelineHealthIndicator],
})
export class HealthModule {}

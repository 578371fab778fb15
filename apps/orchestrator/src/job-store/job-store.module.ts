import { Module } from '@nestjs/common';
import { DatabaseModule } from '@jobflow/database';
import { JobStore } from './job-store';
import { TypeOrmJobStore } from './typeorm-job-store';

@Module({
  imports: [DatabaseModule.forFeature()],
  providers: [{ provide: JobStore, useClass: TypeOrmJobStore }],
  exports: [JobStore],
})
export class JobStoreModule {}

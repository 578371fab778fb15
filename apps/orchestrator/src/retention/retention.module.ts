import { Module } from '@nestjs/common';
import { JobStoreModule } from '../job-store/job-store.module';
import { TasksModule } from '../tasks/tasks.module';
import { RetentionPurgerService } from './retention-purger.service';

@Module({
  imports: [JobStoreModule, TasksModule],
  providers: [RetentionPurgerService],
  exports: [RetentionPurgerService],
})
export class RetentionModule {}

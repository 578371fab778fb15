import { Module } from '@nestjs/common';
import { BackgroundTaskRegistry } from './background-task.registry';

@Module({
  providers: [BackgroundTaskRegistry],
  exports: [BackgroundTaskRegistry],
})
export class TasksModule {}

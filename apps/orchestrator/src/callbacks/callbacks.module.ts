import { Module } from '@nestjs/common';
import { CallbackDispatcher } from './callback-dispatcher.service';

@Module({
  providers: [CallbackDispatcher],
  exports: [CallbackDispatcher],
})
export class CallbacksModule {}

import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PIPELINE_SETTINGS, loadPipelineSettings } from './pipeline.settings';

/**
 * SettingsModule: exposes the typed PipelineSettings to every module.
 *
 * Tests replace the whole object with
 * `.overrideProvider(PIPELINE_SETTINGS).useValue(...)`.
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: PIPELINE_SETTINGS,
      inject: [ConfigService],
      useFactory: loadPipelineSettings,
    },
  ],
  exports: [PIPELINE_SETTINGS],
})
export class SettingsModule {}

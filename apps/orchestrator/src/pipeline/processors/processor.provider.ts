import { Provider } from '@nestjs/common';
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from '../../config/pipeline.settings';
import { HttpProcessor } from './http.processor';
import { NoopProcessor } from './noop.processor';
import { Processor } from './processor';

/** Binds the Processor token to the implementation named by PROCESSOR_KIND */
export const processorProvider: Provider = {
  provide: Processor,
  inject: [PIPELINE_SETTINGS],
  useFactory: (settings: PipelineSettings): Processor => {
    switch (settings.processor.kind) {
      case 'http':
        return new HttpProcessor(settings);
      case 'noop':
        return new NoopProcessor();
    }
  },
};

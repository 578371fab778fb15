import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const configService = app.get(ConfigService);
  configureApp(app);

  // ── Start ─────────────────────────────────────────────
  const port = configService.get<number>('PORT', 4000);
  await app.listen(port);

  logger.log(`Orchestrator running on http://localhost:${port}`);
  logger.log(
    `Pipeline ${configService.get<string>('PIPELINE_VERSION')} with ${configService.get<number>('PIPELINE_MAX_CONCURRENCY')} slot(s), processor "${configService.get<string>('PROCESSOR_KIND')}"`,
  );
}

bootstrap().catch((err: unknown) => {
  const message = err instanceof Error ? (err.stack ?? err.message) : String(err);
  new Logger('Bootstrap').error(`Failed to start: ${message}`);
  process.exit(1);
});

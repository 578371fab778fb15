import { INestApplication, ValidationPipe } from '@nestjs/common';

/** Global pipes and lifecycle hooks shared by main.ts and the e2e tests */
export function configureApp(app: INestApplication): void {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // onApplicationShutdown drains background tasks on SIGTERM/SIGINT
  app.enableShutdownHooks();
}

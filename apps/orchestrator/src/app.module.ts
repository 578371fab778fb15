import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ScheduleModule } from '@nestjs/schedule';
import { validateEnvironment } from './config/env.validation';
import { buildDatabaseOptions } from './config/database.config';
import { SettingsModule } from './config/settings.module';
import { JobsModule } from './jobs/jobs.module';
import { RetentionModule } from './retention/retention.module';
import { RecoveryModule } from './recovery/recovery.module';
import { HealthModule } from './health/health.module';

/** Everything except configuration and the database connection */
export const FEATURE_MODULES = [
  JobsModule,
  RetentionModule,
  RecoveryModule,
  HealthModule,
];

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
      validate: validateEnvironment,
    }),
    SettingsModule,

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: buildDatabaseOptions,
    }),

    // ── Scheduling (retention cron) ───────────────────────
    ScheduleModule.forRoot(),

    // ── Feature Modules ───────────────────────────────────
    ...FEATURE_MODULES,
  ],
})
export class AppModule {}

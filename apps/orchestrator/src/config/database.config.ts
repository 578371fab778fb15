import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DATABASE_ENTITIES } from '@jobflow/database';

/** PostgreSQL connection for the running service; schema changes go through migrations */
export function buildDatabaseOptions(
  configService: ConfigService,
): TypeOrmModuleOptions {
  return {
    type: 'postgres',
    host: configService.get<string>('POSTGRES_HOST', 'localhost'),
    port: configService.get<number>('POSTGRES_PORT', 5432),
    username: configService.get<string>('POSTGRES_USER', 'jobflow'),
    password: configService.get<string>('POSTGRES_PASSWORD', 'jobflow_secret'),
    database: configService.get<string>('POSTGRES_DB', 'jobflow'),
    entities: DATABASE_ENTITIES,
    synchronize: false,
    logging: configService.get<string>('NODE_ENV') === 'development',
  };
}

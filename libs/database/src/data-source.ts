import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';

import { DATABASE_ENTITIES } from './database.module';

/**
 * Load env vars from the project root .env file.
 * Supports both running from libs/database/ and from project root.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../.env') });

/**
 * TypeORM DataSource configuration for CLI-driven migrations.
 *
 * This file is used by:
 * - `typeorm migration:run`: applies pending migrations
 * - `typeorm migration:revert`: reverts the last applied migration
 *
 * Point the CLI at the compiled file (dist/libs/database/src/data-source.js).
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'jobflow',
  password: process.env['POSTGRES_PASSWORD'] || 'jobflow_secret',
  database: process.env['POSTGRES_DB'] || 'jobflow',
  entities: DATABASE_ENTITIES,
  migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;

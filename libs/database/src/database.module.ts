import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Content } from './entities/content.entity';
import { PipelineJob } from './entities/pipeline-job.entity';

/** All entity classes registered in this database library */
export const DATABASE_ENTITIES = [Content, PipelineJob];

/**
 * DatabaseModule: registers all TypeORM entity repositories.
 *
 * @example
 * ```ts
 * @Module({
 *   imports: [DatabaseModule.forFeature()],
 * })
 * export class SomeFeatureModule {}
 * ```
 */
@Module({})
export class DatabaseModule {
  /**
   * Registers all entity repositories for injection.
   * Uses TypeOrmModule.forFeature under the hood.
   */
  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forFeature(DATABASE_ENTITIES)],
      exports: [TypeOrmModule],
    };
  }
}

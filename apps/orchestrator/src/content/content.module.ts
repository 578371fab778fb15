import { Module } from '@nestjs/common';
import { DatabaseModule } from '@jobflow/database';
import { ContentStatusProjector } from './content-status.projector';
import { TypeOrmContentStatusProjector } from './typeorm-content-status.projector';
import { VersionDriftService } from './version-drift.service';

@Module({
  imports: [DatabaseModule.forFeature()],
  providers: [
    { provide: ContentStatusProjector, useClass: TypeOrmContentStatusProjector },
    VersionDriftService,
  ],
  exports: [ContentStatusProjector, VersionDriftService],
})
export class ContentModule {}

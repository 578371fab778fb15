import { Module } from '@nestjs/common';
import { ResourceKeyCodec } from './resource-key.codec';

@Module({
  providers: [ResourceKeyCodec],
  exports: [ResourceKeyCodec],
})
export class ResourceKeyModule {}

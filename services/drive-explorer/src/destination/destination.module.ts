import { Module } from '@nestjs/common';
import { RegistryModule } from '../registry/registry.module';
import { buildS3Client, DestinationSinkFactory, S3_CLIENT_BUILDER } from './destination-sink.factory';

@Module({
  imports: [RegistryModule],
  providers: [DestinationSinkFactory, { provide: S3_CLIENT_BUILDER, useValue: buildS3Client }],
  exports: [DestinationSinkFactory],
})
export class DestinationModule {}

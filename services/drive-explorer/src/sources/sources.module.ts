import { Module } from '@nestjs/common';
import { MicrosoftApisModule } from '../microsoft-apis/microsoft-apis.module';
import { RegistryModule } from '../registry/registry.module';
import { ContentDownloader } from './content-downloader.service';
import { RemoteSourceFactory } from './remote-source.factory';

@Module({
  imports: [MicrosoftApisModule, RegistryModule],
  providers: [ContentDownloader, RemoteSourceFactory],
  exports: [RemoteSourceFactory],
})
export class SourcesModule {}

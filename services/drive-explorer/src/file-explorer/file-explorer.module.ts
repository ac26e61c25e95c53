import { Module } from '@nestjs/common';
import { BrowserModule } from '../browser/browser.module';
import { DestinationModule } from '../destination/destination.module';
import { MetricsModule } from '../metrics/metrics.module';
import { SourcesModule } from '../sources/sources.module';
import { TransferModule } from '../transfer/transfer.module';
import { FileExplorerController } from './file-explorer.controller';
import { FileExplorerService } from './file-explorer.service';

@Module({
  imports: [BrowserModule, DestinationModule, MetricsModule, SourcesModule, TransferModule],
  controllers: [FileExplorerController],
  providers: [FileExplorerService],
})
export class FileExplorerModule {}

import { Module } from '@nestjs/common';
import { MetricsModule } from '../metrics/metrics.module';
import { ContentDownloadStep } from './steps/content-download.step';
import { DestinationUploadStep } from './steps/destination-upload.step';
import { DownloadUrlResolutionStep } from './steps/download-url-resolution.step';
import { FileCheckStep } from './steps/file-check.step';
import { MetadataResolutionStep } from './steps/metadata-resolution.step';
import { RecordBuildingStep } from './steps/record-building.step';
import { TransferPipeline } from './transfer-pipeline.service';

@Module({
  imports: [MetricsModule],
  providers: [
    TransferPipeline,
    MetadataResolutionStep,
    FileCheckStep,
    DownloadUrlResolutionStep,
    RecordBuildingStep,
    ContentDownloadStep,
    DestinationUploadStep,
  ],
  exports: [TransferPipeline],
})
export class TransferModule {}

import { Injectable } from '@nestjs/common';
import { UpstreamUnavailableError } from '../../errors/drive-explorer.error';
import type { TransferContext } from '../types/transfer-context';
import { PipelineStep } from '../types/transfer-context';
import type { IPipelineStep } from './pipeline-step.interface';

@Injectable()
export class DownloadUrlResolutionStep implements IPipelineStep {
  public readonly stepName = PipelineStep.DownloadUrlResolution;

  public async execute(context: TransferContext): Promise<TransferContext> {
    const downloadUrl = await context.source.getDownloadUrl(context.driveId, context.fileId);
    if (!downloadUrl) {
      throw new UpstreamUnavailableError('could not get download URL', { fileId: context.fileId });
    }
    context.downloadUrl = downloadUrl;
    return context;
  }
}

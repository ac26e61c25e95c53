import assert from 'node:assert';
import { Injectable, Logger } from '@nestjs/common';
import { UpstreamUnavailableError } from '../../errors/drive-explorer.error';
import type { TransferContext } from '../types/transfer-context';
import { PipelineStep } from '../types/transfer-context';
import type { IPipelineStep } from './pipeline-step.interface';

@Injectable()
export class ContentDownloadStep implements IPipelineStep {
  private readonly logger = new Logger(this.constructor.name);
  public readonly stepName = PipelineStep.ContentDownload;

  public async execute(context: TransferContext, signal?: AbortSignal): Promise<TransferContext> {
    assert.ok(context.record, 'Content download requires a file record');

    const downloaded = await context.source.downloadContent(context.record, signal);
    if (signal?.aborted) {
      // the item already has its outcome, nothing else will release this content
      await context.source.releaseContent(downloaded);
      throw new UpstreamUnavailableError('download finished after the step was abandoned', {
        fileId: context.fileId,
      });
    }
    if (!downloaded.localPath) {
      throw new UpstreamUnavailableError('download failed', { fileId: context.fileId });
    }
    context.record = downloaded;
    this.logger.debug(`${context.logPrefix} Downloaded ${downloaded.size} bytes`);
    return context;
  }
}

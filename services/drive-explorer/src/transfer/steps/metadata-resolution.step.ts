import { Injectable } from '@nestjs/common';
import type { TransferContext } from '../types/transfer-context';
import { PipelineStep } from '../types/transfer-context';
import type { IPipelineStep } from './pipeline-step.interface';

@Injectable()
export class MetadataResolutionStep implements IPipelineStep {
  public readonly stepName = PipelineStep.MetadataResolution;

  public async execute(context: TransferContext): Promise<TransferContext> {
    context.metadata = await context.source.getItemMetadata(context.driveId, context.fileId);
    return context;
  }
}

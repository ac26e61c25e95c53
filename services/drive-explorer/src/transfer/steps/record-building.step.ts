import assert from 'node:assert';
import { Injectable } from '@nestjs/common';
import { ItemSkippedError } from '../../errors/drive-explorer.error';
import type { TransferContext } from '../types/transfer-context';
import { PipelineStep } from '../types/transfer-context';
import type { IPipelineStep } from './pipeline-step.interface';

@Injectable()
export class RecordBuildingStep implements IPipelineStep {
  public readonly stepName = PipelineStep.RecordBuilding;

  public async execute(context: TransferContext): Promise<TransferContext> {
    assert.ok(context.metadata, 'Record building requires resolved metadata');
    assert.ok(context.downloadUrl, 'Record building requires a download URL');

    const record = context.source.buildFileRecord(
      context.metadata,
      context.lineage,
      context.downloadUrl,
    );
    if (!record) {
      throw new ItemSkippedError('could not create file record', { fileId: context.fileId });
    }
    context.record = record;
    return context;
  }
}

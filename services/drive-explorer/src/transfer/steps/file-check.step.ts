import assert from 'node:assert';
import { Injectable } from '@nestjs/common';
import { ItemSkippedError } from '../../errors/drive-explorer.error';
import type { TransferContext } from '../types/transfer-context';
import { PipelineStep } from '../types/transfer-context';
import type { IPipelineStep } from './pipeline-step.interface';

@Injectable()
export class FileCheckStep implements IPipelineStep {
  public readonly stepName = PipelineStep.FileCheck;

  public async execute(context: TransferContext): Promise<TransferContext> {
    assert.ok(context.metadata, 'File check requires resolved metadata');
    if (!context.metadata.file) {
      throw new ItemSkippedError('not a file (may be a folder)', { fileId: context.fileId });
    }
    return context;
  }
}

import assert from 'node:assert';
import { Injectable } from '@nestjs/common';
import type { TransferContext } from '../types/transfer-context';
import { PipelineStep } from '../types/transfer-context';
import type { IPipelineStep } from './pipeline-step.interface';

@Injectable()
export class DestinationUploadStep implements IPipelineStep {
  public readonly stepName = PipelineStep.DestinationUpload;

  public async execute(context: TransferContext): Promise<TransferContext> {
    assert.ok(context.record, 'Destination upload requires a file record');
    await context.sink.bulkInsert([context.record]);
    return context;
  }
}

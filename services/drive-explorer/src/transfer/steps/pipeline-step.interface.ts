import type { PipelineStep, TransferContext } from '../types/transfer-context';

export interface IPipelineStep {
  readonly stepName: PipelineStep;
  /** `signal` aborts once the step has timed out and its result will be discarded. */
  execute: (context: TransferContext, signal?: AbortSignal) => Promise<TransferContext>;
}

import { type BatchReport, type TransferOutcome, TransferStatus } from './types/transfer-context';

export function buildBatchReport(outcomes: TransferOutcome[]): BatchReport {
  const count = (status: TransferStatus) => outcomes.filter((o) => o.status === status).length;
  return {
    totalFiles: outcomes.length,
    successful: count(TransferStatus.Success),
    failed: count(TransferStatus.Failed),
    skipped: count(TransferStatus.Skipped),
    outcomes,
  };
}

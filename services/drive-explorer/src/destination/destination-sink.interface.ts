import type { FileRecord } from '../sources/file-record';

export interface DestinationSink {
  /** Writes the records' local content and metadata; rejects when any record could not be written. */
  bulkInsert(records: FileRecord[]): Promise<void>;
  destinationPathFor(record: FileRecord): string;
  describe(): string;
}

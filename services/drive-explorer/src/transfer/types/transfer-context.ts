import type { DestinationSink } from '../../destination/destination-sink.interface';
import type { DriveExplorerErrorCode } from '../../errors/drive-explorer.error';
import type { GraphDriveItem } from '../../microsoft-apis/graph/types/graph.schemas';
import type { Breadcrumb, FileRecord } from '../../sources/file-record';
import type { RemoteSource } from '../../sources/remote-source.interface';

export interface TransferRequest {
  fileIds: string[];
  collectionId: string;
  driveId: string;
  siteId?: string;
}

export const TransferStatus = {
  Success: 'success',
  Failed: 'failed',
  Skipped: 'skipped',
} as const;
export type TransferStatus = (typeof TransferStatus)[keyof typeof TransferStatus];

export interface TransferOutcome {
  fileId: string;
  fileName: string;
  status: TransferStatus;
  error?: string;
  errorCode?: DriveExplorerErrorCode;
  destinationPath?: string;
}

export interface BatchReport {
  totalFiles: number;
  successful: number;
  failed: number;
  skipped: number;
  outcomes: TransferOutcome[];
}

/** State of one item travelling through the transfer steps. */
export interface TransferContext {
  fileId: string;
  driveId: string;
  siteId?: string;
  source: RemoteSource;
  sink: DestinationSink;
  lineage: Breadcrumb[];
  logPrefix: string;
  metadata?: GraphDriveItem;
  downloadUrl?: string;
  record?: FileRecord;
}

export const PipelineStep = {
  MetadataResolution: 'MetadataResolution',
  FileCheck: 'FileCheck',
  DownloadUrlResolution: 'DownloadUrlResolution',
  RecordBuilding: 'RecordBuilding',
  ContentDownload: 'ContentDownload',
  DestinationUpload: 'DestinationUpload',
} as const;
export type PipelineStep = (typeof PipelineStep)[keyof typeof PipelineStep];

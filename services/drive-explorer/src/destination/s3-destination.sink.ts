import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { PutObjectCommand, type S3Client } from '@aws-sdk/client-s3';
import { Logger } from '@nestjs/common';
import { ValidationError } from '../errors/drive-explorer.error';
import type { S3StorageConfig } from '../registry/registry.schema';
import type { FileRecord } from '../sources/file-record';
import type { Concealer } from '../utils/logging.util';
import type { DestinationSink } from './destination-sink.interface';

export interface S3DestinationTarget {
  collectionReadableId: string;
  storage: S3StorageConfig;
}

/**
 * Stores each record as a blob plus a JSON entity document under
 * `{prefix}collections/{readableId}/`.
 */
export class S3DestinationSink implements DestinationSink {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(
    private readonly client: S3Client,
    private readonly target: S3DestinationTarget,
    private readonly conceal: Concealer,
  ) {}

  public async bulkInsert(records: FileRecord[]): Promise<void> {
    for (const record of records) {
      await this.putBlob(record);
      await this.putEntity(record);
      this.logger.debug(`[Item: ${this.conceal(record.name)}] Stored in ${this.describe()}`);
    }
  }

  public destinationPathFor(record: FileRecord): string {
    return `s3://${this.target.storage.bucket}/${this.blobKey(record)}`;
  }

  public describe(): string {
    return `s3://${this.target.storage.bucket}/${this.collectionPrefix()}`;
  }

  private async putBlob(record: FileRecord): Promise<void> {
    if (!record.localPath) {
      throw new ValidationError(`Record ${record.id} has no downloaded content`, {
        recordId: record.id,
      });
    }

    const { size } = await stat(record.localPath);
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.target.storage.bucket,
        Key: this.blobKey(record),
        Body: createReadStream(record.localPath),
        ContentLength: size,
        ContentType: record.mimeType,
      }),
    );
  }

  private async putEntity(record: FileRecord): Promise<void> {
    const { localPath: _localPath, downloadUrl: _downloadUrl, ...entity } = record;
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.target.storage.bucket,
        Key: this.entityKey(record),
        Body: JSON.stringify({ ...entity, blobKey: this.blobKey(record) }),
        ContentType: 'application/json',
      }),
    );
  }

  private collectionPrefix(): string {
    return `${this.target.storage.prefix}collections/${this.target.collectionReadableId}/`;
  }

  private blobKey(record: FileRecord): string {
    return `${this.collectionPrefix()}blobs/${record.id}`;
  }

  private entityKey(record: FileRecord): string {
    return `${this.collectionPrefix()}entities/${record.id}.json`;
  }
}

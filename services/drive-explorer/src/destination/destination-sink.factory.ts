import { S3Client } from '@aws-sdk/client-s3';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Config } from '../config';
import { NotFoundError, ValidationError } from '../errors/drive-explorer.error';
import type { S3StorageConfig } from '../registry/registry.schema';
import { COLLECTION_REGISTRY, type CollectionRegistry } from '../registry/registry.service';
import { type Concealer, getConcealer } from '../utils/logging.util';
import type { DestinationSink } from './destination-sink.interface';
import { S3DestinationSink } from './s3-destination.sink';

export type S3ClientBuilder = (storage: S3StorageConfig) => S3Client;

export const S3_CLIENT_BUILDER = Symbol('S3_CLIENT_BUILDER');

export const buildS3Client: S3ClientBuilder = (storage) =>
  new S3Client({
    region: storage.region,
    endpoint: storage.endpoint,
    forcePathStyle: storage.forcePathStyle,
    credentials:
      storage.accessKeyId && storage.secretAccessKey
        ? { accessKeyId: storage.accessKeyId, secretAccessKey: storage.secretAccessKey.value }
        : undefined,
  });

@Injectable()
export class DestinationSinkFactory {
  private readonly logger = new Logger(this.constructor.name);
  private readonly conceal: Concealer;

  public constructor(
    @Inject(COLLECTION_REGISTRY) private readonly collectionRegistry: CollectionRegistry,
    @Inject(S3_CLIENT_BUILDER) private readonly buildClient: S3ClientBuilder,
    configService: ConfigService<Config, true>,
  ) {
    this.conceal = getConcealer(configService);
  }

  public createSink(collectionId: string): DestinationSink {
    const collection = this.collectionRegistry.findCollection(collectionId);
    if (!collection) {
      throw new NotFoundError(`Collection ${collectionId} not found`, { collectionId });
    }
    if (!collection.storage) {
      throw new ValidationError(`Collection ${collectionId} has no storage configured`, {
        collectionId,
      });
    }

    const sink = new S3DestinationSink(
      this.buildClient(collection.storage),
      { collectionReadableId: collection.readableId, storage: collection.storage },
      this.conceal,
    );
    this.logger.log(`[Collection: ${collection.readableId}] Writing to ${sink.describe()}`);
    return sink;
  }
}

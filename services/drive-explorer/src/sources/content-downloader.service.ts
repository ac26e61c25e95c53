import { createWriteStream } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { request } from 'undici';
import type { Config } from '../config';
import { UpstreamUnavailableError, ValidationError } from '../errors/drive-explorer.error';

const MAX_REDIRECTIONS = 5;

/** Stages remote content in the download directory for the duration of one transfer item. */
@Injectable()
export class ContentDownloader {
  private readonly logger = new Logger(this.constructor.name);
  private readonly maxFileSizeBytes: number;
  private readonly downloadDirectory: string;

  public constructor(configService: ConfigService<Config, true>) {
    this.maxFileSizeBytes = configService.get('transfer.maxFileSizeBytes', { infer: true });
    this.downloadDirectory = configService.get('transfer.downloadDirectory', { infer: true });
  }

  /**
   * Downloads `url` into a file named `fileName` and returns the file's path.
   * An aborted `signal` stops the transfer and removes the partial file.
   */
  public async download(url: string, fileName: string, signal?: AbortSignal): Promise<string> {
    await mkdir(this.downloadDirectory, { recursive: true });
    const localPath = join(this.downloadDirectory, fileName);

    const { statusCode, headers, body } = await request(url, {
      method: 'GET',
      maxRedirections: MAX_REDIRECTIONS,
      signal,
    });

    if (statusCode >= 400) {
      await body.dump();
      throw new UpstreamUnavailableError(`Download failed with status ${statusCode}`, {
        statusCode,
      });
    }

    const announcedSize = Number(headers['content-length']);
    if (Number.isFinite(announcedSize) && announcedSize > this.maxFileSizeBytes) {
      await body.dump();
      throw this.tooLargeError(announcedSize);
    }

    const maxFileSizeBytes = this.maxFileSizeBytes;
    const tooLargeError = (size: number) => this.tooLargeError(size);
    let receivedBytes = 0;

    try {
      await pipeline(
        body,
        async function* (source: AsyncIterable<Buffer>) {
          for await (const chunk of source) {
            receivedBytes += chunk.length;
            if (receivedBytes > maxFileSizeBytes) throw tooLargeError(receivedBytes);
            yield chunk;
          }
        },
        createWriteStream(localPath),
        { signal },
      );
    } catch (error) {
      await rm(localPath, { force: true });
      throw error;
    }

    this.logger.debug(`Downloaded ${receivedBytes} bytes`);
    return localPath;
  }

  public async release(localPath: string): Promise<void> {
    await rm(localPath, { force: true });
  }

  private tooLargeError(size: number): ValidationError {
    return new ValidationError(
      `File size ${size} bytes exceeds the limit of ${this.maxFileSizeBytes} bytes`,
      { size, maxFileSizeBytes: this.maxFileSizeBytes },
    );
  }
}

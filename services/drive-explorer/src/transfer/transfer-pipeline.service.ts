import { elapsedSecondsLog, mapInChunks, normalizeError } from '@drive-explorer/utils';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Counter } from '@opentelemetry/api';
import type { Config } from '../config';
import type { DestinationSink } from '../destination/destination-sink.interface';
import {
  DriveExplorerError,
  ItemSkippedError,
  UpstreamUnavailableError,
} from '../errors/drive-explorer.error';
import { DEX_TRANSFER_ITEM_PROCESSED_TOTAL } from '../metrics';
import type { RemoteSource } from '../sources/remote-source.interface';
import { type Concealer, getConcealer } from '../utils/logging.util';
import { buildBatchReport } from './batch-report';
import { ContentDownloadStep } from './steps/content-download.step';
import { DestinationUploadStep } from './steps/destination-upload.step';
import { DownloadUrlResolutionStep } from './steps/download-url-resolution.step';
import { FileCheckStep } from './steps/file-check.step';
import { MetadataResolutionStep } from './steps/metadata-resolution.step';
import type { IPipelineStep } from './steps/pipeline-step.interface';
import { RecordBuildingStep } from './steps/record-building.step';
import {
  type BatchReport,
  type TransferContext,
  type TransferOutcome,
  type TransferRequest,
  TransferStatus,
} from './types/transfer-context';

/**
 * Moves a batch of selected files from a remote source into a destination.
 * Every item ends in exactly one outcome; nothing that goes wrong with one
 * item affects the others.
 */
@Injectable()
export class TransferPipeline {
  private readonly logger = new Logger(this.constructor.name);
  private readonly pipelineSteps: IPipelineStep[];
  private readonly conceal: Concealer;

  public constructor(
    private readonly configService: ConfigService<Config, true>,
    metadataResolutionStep: MetadataResolutionStep,
    fileCheckStep: FileCheckStep,
    downloadUrlResolutionStep: DownloadUrlResolutionStep,
    recordBuildingStep: RecordBuildingStep,
    contentDownloadStep: ContentDownloadStep,
    destinationUploadStep: DestinationUploadStep,
    @Inject(DEX_TRANSFER_ITEM_PROCESSED_TOTAL)
    private readonly dexTransferItemProcessedTotal: Counter,
  ) {
    this.conceal = getConcealer(configService);
    this.pipelineSteps = [
      metadataResolutionStep,
      fileCheckStep,
      downloadUrlResolutionStep,
      recordBuildingStep,
      contentDownloadStep,
      destinationUploadStep,
    ];
  }

  public async run(
    source: RemoteSource,
    sink: DestinationSink,
    request: TransferRequest,
  ): Promise<BatchReport> {
    const { fileIds, driveId, siteId } = request;
    const logPrefix = `[Connection: ${this.conceal(source.connectionId)}][Drive: ${this.conceal(driveId)}]`;
    const startTime = Date.now();
    this.logger.log(`${logPrefix} Transferring ${fileIds.length} items to ${sink.describe()}`);

    const lineage = await source.resolveLineage(driveId, siteId);
    const outcomes = await mapInChunks({
      items: fileIds,
      chunkSize: this.configService.get('transfer.concurrency', { infer: true }),
      mapper: (fileId) =>
        this.processItem({
          fileId,
          driveId,
          siteId,
          source,
          sink,
          lineage,
          logPrefix: `${logPrefix}[Item: ${this.conceal(fileId)}]`,
        }),
      logger: this.logger,
      logPrefix,
    });

    const report = buildBatchReport(outcomes);
    this.logger.log(
      `${logPrefix} Transfer finished in ${elapsedSecondsLog(startTime)}: ${report.successful} successful, ` +
        `${report.failed} failed, ${report.skipped} skipped`,
    );
    return report;
  }

  private async processItem(context: TransferContext): Promise<TransferOutcome> {
    let outcome: TransferOutcome;

    try {
      for (const step of this.pipelineSteps) {
        await this.executeWithTimeout(step, context);
        this.logger.debug(`${context.logPrefix} Completed step: ${step.stepName}`);
      }
      outcome = {
        fileId: context.fileId,
        fileName: this.fileNameOf(context),
        status: TransferStatus.Success,
        destinationPath: context.record ? context.sink.destinationPathFor(context.record) : undefined,
      };
    } catch (error) {
      outcome = this.toFailureOutcome(context, error);
    } finally {
      await this.releaseContent(context);
    }

    this.dexTransferItemProcessedTotal.add(1, { status: outcome.status });
    return outcome;
  }

  private toFailureOutcome(context: TransferContext, error: unknown): TransferOutcome {
    const message = normalizeError(error).message;
    const skipped = error instanceof ItemSkippedError;

    if (skipped) {
      this.logger.log(`${context.logPrefix} Skipped: ${message}`);
    } else {
      this.logger.warn(`${context.logPrefix} Transfer failed: ${message}`);
    }

    return {
      fileId: context.fileId,
      fileName: this.fileNameOf(context),
      status: skipped ? TransferStatus.Skipped : TransferStatus.Failed,
      error: message,
      errorCode: error instanceof DriveExplorerError ? error.code : undefined,
    };
  }

  private fileNameOf(context: TransferContext): string {
    return context.record?.name ?? context.metadata?.name ?? context.fileId;
  }

  // The timer is cleared as soon as the step settles; on timeout the step is told to abort.
  private executeWithTimeout(
    step: IPipelineStep,
    context: TransferContext,
  ): Promise<TransferContext> {
    const stepTimeoutMs =
      this.configService.get('transfer.stepTimeoutSeconds', { infer: true }) * 1000;
    const abortController = new AbortController();

    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        const timeoutError = new UpstreamUnavailableError(
          `Step ${step.stepName} timed out after ${stepTimeoutMs}ms`,
          { step: step.stepName, isTimeout: true },
        );
        reject(timeoutError);
        abortController.abort(timeoutError);
      }, stepTimeoutMs);

      step
        .execute(context, abortController.signal)
        .then(resolve)
        .catch(reject)
        .finally(() => clearTimeout(timeoutId));
    });
  }

  private async releaseContent(context: TransferContext): Promise<void> {
    if (!context.record?.localPath) return;
    try {
      await context.source.releaseContent(context.record);
    } catch (error) {
      this.logger.warn(
        `${context.logPrefix} Could not remove local content: ${normalizeError(error).message}`,
      );
    }
  }
}

/**
 * Direct HTTP Download
 * 
 * Plain GET against the source URL, streamed to disk.
 */

import { AcquisitionError } from '@loopcast/core';
import { formatMegabytes, getFileSizeBytes, logger as rootLogger, type Logger } from '@loopcast/utils';
import { writeBodyToFile } from '../progress.js';
import { contentLength, type HttpTransport } from '../transport.js';
import type {
  AcquisitionStrategy,
  AcquisitionTarget,
  DownloadResult,
  StrategyOptions,
} from '../types.js';

export interface DirectHttpOptions extends StrategyOptions {
  timeoutMs?: number;
  progressIntervalBytes?: number;
}

export class DirectHttpStrategy implements AcquisitionStrategy {
  readonly name = 'direct';

  private transport: HttpTransport;
  private timeoutMs: number;
  private progressIntervalBytes: number;
  private logger: Logger;

  constructor(transport: HttpTransport, options: DirectHttpOptions = {}) {
    this.transport = transport;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.progressIntervalBytes = options.progressIntervalBytes ?? 10 * 1024 * 1024;
    this.logger = options.logger ?? rootLogger.child({ strategy: this.name });
  }

  async fetch(
    target: AcquisitionTarget,
    outputPath: string,
    signal?: AbortSignal
  ): Promise<DownloadResult> {
    const startTime = Date.now();
    this.logger.info({ url: target.url }, 'Downloading from direct URL');

    const response = await this.transport.get(target.url, {
      timeoutMs: this.timeoutMs,
      signal,
    });

    if (response.statusCode < 200 || response.statusCode >= 300) {
      response.body.destroy();
      throw new AcquisitionError(
        'HTTP_STATUS',
        `Download failed with HTTP ${response.statusCode}`,
        { url: target.url, statusCode: response.statusCode }
      );
    }

    const totalBytes = contentLength(response.headers);

    await writeBodyToFile(response.body, outputPath, {
      intervalBytes: this.progressIntervalBytes,
      totalBytes,
      onProgress: ({ bytesDownloaded, percentage }) => {
        this.logger.info({
          downloaded: formatMegabytes(bytesDownloaded),
          percentage: percentage === undefined ? undefined : Number(percentage.toFixed(1)),
        }, 'Download progress');
      },
    }, signal);

    const fileSize = await getFileSizeBytes(outputPath);
    this.logger.info({ fileSize: formatMegabytes(fileSize) }, 'Download complete');

    return {
      success: true,
      strategy: this.name,
      filePath: outputPath,
      fileSize,
      duration: Date.now() - startTime,
    };
  }
}

/**
 * Acquisition Engine
 * 
 * Produces a verified local media file from a source URL:
 * 
 *   direct URL  → DirectHttpStrategy → size check
 *   Drive URL   → DriveConfirmStrategy → size check
 *                   ↘ (error / HTML / undersized) → GdownStrategy → size check
 * 
 * Never hands back a file at or below MIN_VALID_FILE_SIZE. Retrying is
 * not its job: when every strategy is spent it throws AcquisitionError.
 */

import { AcquisitionError, CancellationError, errorMessage } from '@loopcast/core';
import { formatMegabytes, logger as rootLogger, type Logger } from '@loopcast/utils';
import { DirectHttpStrategy } from './clients/direct.js';
import { DriveConfirmStrategy } from './clients/gdrive.js';
import { GdownStrategy } from './clients/gdown.js';
import { linkDetector, type DetectedLink } from './linkDetector.js';
import { UndiciTransport, type HttpTransport } from './transport.js';
import {
  MIN_VALID_FILE_SIZE,
  isValidDownload,
  type AcquisitionStrategy,
  type AcquisitionTarget,
  type DownloadResult,
} from './types.js';

export interface AcquisitionStrategies {
  direct: AcquisitionStrategy;
  confirm: AcquisitionStrategy;
  fallback: AcquisitionStrategy;
}

export interface AcquisitionEngineOptions {
  logger?: Logger;
}

export interface AcquisitionEngineConfig {
  transport?: HttpTransport;
  directTimeoutMs?: number;
  driveTimeoutMs?: number;
  fallbackTimeoutMs?: number;
  logger?: Logger;
}

export class AcquisitionEngine {
  private strategies: AcquisitionStrategies;
  private logger: Logger;

  constructor(strategies: AcquisitionStrategies, options: AcquisitionEngineOptions = {}) {
    this.strategies = strategies;
    this.logger = options.logger ?? rootLogger.child({ component: 'acquisition' });
  }

  /**
   * Wire the default strategies over a shared undici transport
   */
  static create(config: AcquisitionEngineConfig = {}): AcquisitionEngine {
    const transport = config.transport ?? new UndiciTransport();
    const logger = config.logger ?? rootLogger.child({ component: 'acquisition' });

    return new AcquisitionEngine(
      {
        direct: new DirectHttpStrategy(transport, {
          timeoutMs: config.directTimeoutMs,
          logger: logger.child({ strategy: 'direct' }),
        }),
        confirm: new DriveConfirmStrategy(transport, {
          timeoutMs: config.driveTimeoutMs,
          logger: logger.child({ strategy: 'gdrive-confirm' }),
        }),
        fallback: new GdownStrategy({
          timeoutMs: config.fallbackTimeoutMs,
          logger: logger.child({ strategy: 'gdown' }),
        }),
      },
      { logger }
    );
  }

  /**
   * Download the source URL to outputPath
   * 
   * @throws AcquisitionError when no strategy produced a valid file
   * @throws CancellationError when the signal aborts
   */
  async acquire(url: string, outputPath: string, signal?: AbortSignal): Promise<DownloadResult> {
    this.logger.info('Preparing video download');

    const link = linkDetector.detect(url);
    if (!link) {
      throw new AcquisitionError('UNSUPPORTED_URL', 'Source URL is empty');
    }

    if (link.type === 'gdrive') {
      return this.acquireFromDrive(link, outputPath, signal);
    }

    return this.acquireDirect(link, outputPath, signal);
  }

  private async acquireDirect(
    link: DetectedLink,
    outputPath: string,
    signal?: AbortSignal
  ): Promise<DownloadResult> {
    const { domain, path } = link.metadata;
    this.logger.info({ domain, path }, 'Detected direct URL');

    let result: DownloadResult;
    try {
      result = await this.strategies.direct.fetch({ url: link.url }, outputPath, signal);
    } catch (error) {
      this.throwIfCancelled(signal);
      this.logger.error({ error: errorMessage(error) }, 'Download error');
      if (error instanceof AcquisitionError) {
        throw error;
      }
      throw new AcquisitionError(
        'TRANSPORT',
        `Download error: ${errorMessage(error)}`,
        { url: link.url },
        { cause: error }
      );
    }

    if (!isValidDownload(result)) {
      throw new AcquisitionError(
        'UNDERSIZED',
        `Downloaded file too small (${result.fileSize} bytes), expected more than ${MIN_VALID_FILE_SIZE}`,
        { fileSize: result.fileSize }
      );
    }

    return result;
  }

  private async acquireFromDrive(
    link: DetectedLink,
    outputPath: string,
    signal?: AbortSignal
  ): Promise<DownloadResult> {
    const { fileId } = link.metadata;
    if (!fileId) {
      this.logger.error({ url: link.url }, 'Could not extract file ID from Google Drive URL');
      throw new AcquisitionError(
        'FILE_ID_NOT_FOUND',
        'Could not extract file ID from Google Drive URL',
        { url: link.url }
      );
    }

    this.logger.info({ fileId }, 'Detected Google Drive URL');
    const target: AcquisitionTarget = { url: link.url, fileId };

    try {
      const result = await this.strategies.confirm.fetch(target, outputPath, signal);
      if (isValidDownload(result)) {
        return result;
      }
      this.logger.warn({ fileSize: result.fileSize }, 'Downloaded file too small, trying alternative method');
    } catch (error) {
      this.throwIfCancelled(signal);
      this.logger.warn({ error: errorMessage(error) }, 'Handshake download failed, trying alternative method');
    }

    return this.acquireWithFallback(target, outputPath, signal);
  }

  private async acquireWithFallback(
    target: AcquisitionTarget,
    outputPath: string,
    signal?: AbortSignal
  ): Promise<DownloadResult> {
    this.logger.info({ strategy: this.strategies.fallback.name }, 'Trying alternative download method');

    let result: DownloadResult;
    try {
      result = await this.strategies.fallback.fetch(target, outputPath, signal);
    } catch (error) {
      this.throwIfCancelled(signal);
      throw new AcquisitionError(
        'FALLBACK_FAILED',
        `Alternative download failed: ${errorMessage(error)}`,
        { fileId: target.fileId },
        { cause: error }
      );
    }

    this.throwIfCancelled(signal);

    if (!isValidDownload(result)) {
      throw new AcquisitionError(
        'FALLBACK_FAILED',
        `Alternative download failed: ${result.error ?? 'file too small'}`,
        { fileId: target.fileId, fileSize: result.fileSize }
      );
    }

    this.logger.info({ fileSize: formatMegabytes(result.fileSize) }, 'Alternative download succeeded');
    return result;
  }

  private throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new CancellationError('download');
    }
  }
}

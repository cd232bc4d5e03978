/**
 * gdown Fallback
 * 
 * Hands the file id to the gdown CLI, which knows the current shape of
 * Drive's warning pages. Used when the confirm-token handshake fails.
 */

import { AcquisitionError, CommandExecutionError, errorMessage, getBinaryPath } from '@loopcast/core';
import {
  executeCommand,
  formatMegabytes,
  logger as rootLogger,
  removeFile,
  safeFileSize,
  type CommandResult,
  type CommandRunner,
  type Logger,
} from '@loopcast/utils';
import {
  MIN_VALID_FILE_SIZE,
  type AcquisitionStrategy,
  type AcquisitionTarget,
  type DownloadResult,
  type StrategyOptions,
} from '../types.js';

export interface GdownOptions extends StrategyOptions {
  binaryPath?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export function buildFallbackUrl(fileId: string): string {
  return `https://drive.google.com/uc?id=${fileId}`;
}

export class GdownStrategy implements AcquisitionStrategy {
  readonly name = 'gdown';

  private binaryPath: string;
  private timeoutMs: number;
  private runner: CommandRunner;
  private logger: Logger;

  constructor(options: GdownOptions = {}) {
    this.binaryPath = options.binaryPath ?? getBinaryPath('gdown');
    this.timeoutMs = options.timeoutMs ?? 30 * 60 * 1000;
    this.runner = options.runner ?? executeCommand;
    this.logger = options.logger ?? rootLogger.child({ strategy: this.name });
  }

  async fetch(
    target: AcquisitionTarget,
    outputPath: string,
    signal?: AbortSignal
  ): Promise<DownloadResult> {
    const { fileId } = target;
    if (!fileId) {
      throw new AcquisitionError('FILE_ID_NOT_FOUND', 'gdown needs a Google Drive file ID', {
        url: target.url,
      });
    }

    const startTime = Date.now();
    const failure = (error: string, fileSize = 0): DownloadResult => ({
      success: false,
      strategy: this.name,
      filePath: outputPath,
      fileSize,
      duration: Date.now() - startTime,
      error,
    });

    this.logger.info({ fileId }, 'Downloading with gdown');

    // Whatever the handshake left behind must not pass for gdown's output
    await removeFile(outputPath);

    let result: CommandResult;
    try {
      result = await this.runner(
        this.binaryPath,
        [buildFallbackUrl(fileId), '-O', outputPath, '--fuzzy'],
        { timeout: this.timeoutMs, signal }
      );
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Alternative method failed');
      return failure(errorMessage(error));
    }

    if (result.exitCode !== 0 || result.timedOut) {
      const error = new CommandExecutionError(this.binaryPath, result.exitCode, result.stderr);
      this.logger.error({
        exitCode: result.exitCode,
        timedOut: result.timedOut,
        stderr: result.stderr.substring(0, 100),
      }, 'gdown failed');
      return failure(result.timedOut ? `gdown timed out after ${this.timeoutMs}ms` : error.message);
    }

    const fileSize = await safeFileSize(outputPath);
    if (fileSize === null) {
      this.logger.error({ outputPath }, 'gdown reported success but wrote no file');
      return failure('gdown wrote no file');
    }

    this.logger.info({ fileSize: formatMegabytes(fileSize) }, 'Download complete');

    if (fileSize <= MIN_VALID_FILE_SIZE) {
      return failure(`Downloaded file too small (${fileSize} bytes)`, fileSize);
    }

    return {
      success: true,
      strategy: this.name,
      filePath: outputPath,
      fileSize,
      duration: Date.now() - startTime,
    };
  }
}

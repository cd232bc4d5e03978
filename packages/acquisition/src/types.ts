/**
 * Acquisition Types
 */

import type { Logger } from '@loopcast/utils';

/**
 * Files at or below this size are presumed to be error or warning pages
 */
export const MIN_VALID_FILE_SIZE = 10_000;

export type StrategyName = 'direct' | 'gdrive-confirm' | 'gdown';

export interface AcquisitionTarget {
  url: string;
  fileId?: string;
}

export interface DownloadResult {
  success: boolean;
  strategy: StrategyName;
  filePath: string;
  fileSize: number;
  duration: number; // milliseconds
  error?: string;
}

/**
 * One way of turning a target into a local file.
 * Strategies may throw; the engine decides what a failure means.
 */
export interface AcquisitionStrategy {
  readonly name: StrategyName;
  fetch(target: AcquisitionTarget, outputPath: string, signal?: AbortSignal): Promise<DownloadResult>;
}

export interface StrategyOptions {
  logger?: Logger;
}

export function isValidDownload(result: DownloadResult): boolean {
  return result.success && result.fileSize > MIN_VALID_FILE_SIZE;
}

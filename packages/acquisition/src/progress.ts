/**
 * Transfer Progress
 * 
 * Streams a response body to disk while reporting progress at coarse
 * byte intervals. The body is never buffered in memory.
 */

import { createWriteStream } from 'node:fs';
import { Transform, type Readable, type TransformCallback } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { ensureParentDir } from '@loopcast/utils';

export interface TransferProgress {
  bytesDownloaded: number;
  totalBytes?: number;
  percentage?: number;
}

export interface ProgressOptions {
  intervalBytes: number;
  totalBytes?: number;
  onProgress?: (progress: TransferProgress) => void;
}

/**
 * Pass-through stream that counts bytes and fires onProgress each time
 * another interval boundary is crossed
 */
export class ProgressCounter extends Transform {
  private bytes = 0;

  constructor(private readonly options: ProgressOptions) {
    super();
  }

  get bytesDownloaded(): number {
    return this.bytes;
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    const previous = this.bytes;
    this.bytes += chunk.length;

    const { intervalBytes, totalBytes, onProgress } = this.options;
    if (onProgress && Math.floor(this.bytes / intervalBytes) > Math.floor(previous / intervalBytes)) {
      onProgress({
        bytesDownloaded: this.bytes,
        totalBytes,
        percentage: totalBytes ? Math.min(100, (this.bytes / totalBytes) * 100) : undefined,
      });
    }

    callback(null, chunk);
  }
}

/**
 * Pipe a body into a file, returning the number of bytes written
 */
export async function writeBodyToFile(
  body: Readable,
  outputPath: string,
  options: ProgressOptions,
  signal?: AbortSignal
): Promise<number> {
  await ensureParentDir(outputPath);

  const counter = new ProgressCounter(options);
  await pipeline(body, counter, createWriteStream(outputPath), { signal });

  return counter.bytesDownloaded;
}

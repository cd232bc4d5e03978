/**
 * FFProbe Wrapper
 * 
 * Reads the container duration of a media file. Best effort: any
 * failure is logged as a warning and reported as an unknown duration.
 */

import { ProbeError, errorMessage, getBinaryPath } from '@loopcast/core';
import {
  executeCommand,
  formatClock,
  logger as rootLogger,
  type CommandRunner,
  type Logger,
} from '@loopcast/utils';

export interface FFProbeOptions {
  ffprobePath?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Parse ffprobe's bare duration output (seconds as a float)
 */
export function parseDuration(output: string): number | null {
  const trimmed = output.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    return null;
  }
  return Number.parseFloat(trimmed);
}

export class FFProbe {
  private ffprobePath: string;
  private timeoutMs: number;
  private runner: CommandRunner;
  private logger: Logger;

  constructor(options: FFProbeOptions = {}) {
    this.ffprobePath = options.ffprobePath ?? getBinaryPath('ffprobe');
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.runner = options.runner ?? executeCommand;
    this.logger = options.logger ?? rootLogger.child({ component: 'ffprobe' });
  }

  /**
   * Get the duration of a media file in seconds, or null when unknown
   */
  async getDuration(filePath: string): Promise<number | null> {
    try {
      const duration = await this.probeDuration(filePath);
      this.logger.info({ duration: formatClock(duration) }, 'Video duration');
      return duration;
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Could not determine duration');
      return null;
    }
  }

  /**
   * @throws ProbeError when ffprobe fails or prints something unexpected
   */
  private async probeDuration(filePath: string): Promise<number> {
    const args = [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      filePath,
    ];

    const result = await this.runner(this.ffprobePath, args, {
      timeout: this.timeoutMs,
    });

    if (result.timedOut) {
      throw new ProbeError(filePath, `ffprobe timed out after ${this.timeoutMs}ms`);
    }

    if (result.exitCode !== 0) {
      throw new ProbeError(filePath, `ffprobe failed: ${result.stderr.trim()}`);
    }

    const duration = parseDuration(result.stdout);
    if (duration === null) {
      throw new ProbeError(filePath, `Failed to parse ffprobe output: ${result.stdout.substring(0, 200)}`);
    }

    return duration;
  }
}

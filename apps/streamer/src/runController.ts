/**
 * Run Controller
 *
 * One run, start to finish:
 *
 *   validate → acquire → verify file → probe (best effort) → supervise
 *
 * Every failure ends here and is mapped to an exit code. Nothing thrown
 * below this point reaches the CLI.
 */

import {
  AcquisitionError,
  CancellationError,
  ConfigurationError,
  errorMessage,
} from '@loopcast/core';
import { MIN_VALID_FILE_SIZE, type DownloadResult } from '@loopcast/acquisition';
import {
  buildStreamArgs,
  buildStreamUrl,
  deriveEncodingPlan,
  redactStreamArgs,
  type SupervisorOutcome,
} from '@loopcast/streaming';
import {
  formatMegabytes,
  maskSecret,
  safeFileSize,
  truncate,
  type Logger,
} from '@loopcast/utils';
import { validateStreamConfig, type AppConfig } from './config/index.js';
import { logger as appLogger } from './lib/logger.js';

export type RunStatus = 'cancelled' | 'exhausted' | 'failed';

export interface RunOutcome {
  status: RunStatus;
  exitCode: 0 | 1;
  error?: Error;
}

export interface MediaAcquirer {
  acquire(url: string, outputPath: string, signal?: AbortSignal): Promise<DownloadResult>;
}

export interface DurationProbe {
  getDuration(filePath: string): Promise<number | null>;
}

export interface Supervisor {
  run(args: string[], signal: AbortSignal): Promise<SupervisorOutcome>;
}

export interface RunControllerDeps {
  acquirer: MediaAcquirer;
  probe: DurationProbe;
  supervisor: Supervisor;
  fileSize?: (filePath: string) => Promise<number | null>;
  logger?: Logger;
}

export class RunController {
  private acquirer: MediaAcquirer;
  private probe: DurationProbe;
  private supervisor: Supervisor;
  private fileSize: (filePath: string) => Promise<number | null>;
  private logger: Logger;

  constructor(deps: RunControllerDeps) {
    this.acquirer = deps.acquirer;
    this.probe = deps.probe;
    this.supervisor = deps.supervisor;
    this.fileSize = deps.fileSize ?? safeFileSize;
    this.logger = deps.logger ?? appLogger;
  }

  async run(config: AppConfig, signal: AbortSignal): Promise<RunOutcome> {
    try {
      return await this.execute(config, signal);
    } catch (error) {
      return this.toOutcome(error, signal);
    }
  }

  private async execute(config: AppConfig, signal: AbortSignal): Promise<RunOutcome> {
    const { stream, videoFile } = config;

    validateStreamConfig(stream);

    const plan = deriveEncodingPlan(stream.quality, stream.aspectRatio);

    this.logger.info({
      streamKey: maskSecret(stream.streamKey),
      videoUrl: truncate(stream.videoUrl, 60),
      quality: stream.quality,
      aspectRatio: stream.aspectRatio,
      resolution: `${plan.width}x${plan.height}`,
      bitrate: plan.videoBitrate,
    }, 'Starting live stream');

    this.throwIfCancelled(signal, 'startup');

    const download = await this.acquirer.acquire(stream.videoUrl, videoFile, signal);
    this.logger.info({
      strategy: download.strategy,
      took: download.duration,
    }, 'Download complete');

    const size = await this.fileSize(videoFile);
    if (size === null) {
      throw new AcquisitionError('MISSING_FILE', `Video file not found: ${videoFile}`, { filePath: videoFile });
    }
    if (size <= MIN_VALID_FILE_SIZE) {
      throw new AcquisitionError(
        'UNDERSIZED',
        `Video file too small (${size} bytes)`,
        { filePath: videoFile, fileSize: size }
      );
    }
    this.logger.info({ size: formatMegabytes(size) }, 'Video ready');

    await this.probe.getDuration(videoFile);

    this.throwIfCancelled(signal, 'startup');

    const args = buildStreamArgs(plan, videoFile, buildStreamUrl(stream.rtmpUrl, stream.streamKey));
    this.logger.debug({ args: redactStreamArgs(args, stream.streamKey) }, 'ffmpeg arguments');

    const outcome = await this.supervisor.run(args, signal);

    if (outcome.status === 'exhausted') {
      this.logger.warn({
        sessions: outcome.sessions,
        restarts: outcome.restarts,
      }, 'Stream stopped: session ceiling reached');
      return { status: 'exhausted', exitCode: 0 };
    }

    this.logger.info({ sessions: outcome.sessions, restarts: outcome.restarts }, 'Stream stopped');
    return { status: 'cancelled', exitCode: 0 };
  }

  private toOutcome(error: unknown, signal: AbortSignal): RunOutcome {
    if (error instanceof CancellationError || signal.aborted) {
      this.logger.info('Stopped before streaming began');
      return { status: 'cancelled', exitCode: 0 };
    }

    if (error instanceof ConfigurationError) {
      this.logger.error({ fields: error.fields }, error.message);
      return { status: 'failed', exitCode: 1, error };
    }

    if (error instanceof AcquisitionError) {
      this.logger.error({ reason: error.reason, error: error.message }, 'Failed to download video');
      return { status: 'failed', exitCode: 1, error };
    }

    this.logger.error({ err: error }, 'Unexpected error');
    return {
      status: 'failed',
      exitCode: 1,
      error: error instanceof Error ? error : new Error(errorMessage(error)),
    };
  }

  private throwIfCancelled(signal: AbortSignal, stage: string): void {
    if (signal.aborted) {
      throw new CancellationError(stage);
    }
  }
}

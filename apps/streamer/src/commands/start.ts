/**
 * Start Command
 * 
 * Download the configured video and stream it until stopped.
 */

import { AcquisitionEngine } from '@loopcast/acquisition';
import { ConfigurationError } from '@loopcast/core';
import { FFProbe } from '@loopcast/media';
import { FFmpegLauncher, StreamSupervisor } from '@loopcast/streaming';
import { configWarnings, loadConfig, type AppConfig, type ConfigOverrides } from '../config/index.js';
import { applyLogLevel, logger } from '../lib/logger.js';
import { printError } from '../lib/output.js';
import { RunController } from '../runController.js';

export interface StartOptions {
  url?: string;
  quality?: string;
  aspect?: string;
  output?: string;
}

export function toOverrides(options: StartOptions): ConfigOverrides {
  return {
    videoUrl: options.url,
    quality: options.quality,
    aspectRatio: options.aspect,
    videoFile: options.output,
  };
}

/**
 * @returns the process exit code
 */
export async function startCommand(options: StartOptions, signal: AbortSignal): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(process.env, toOverrides(options));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printError(error.message);
      return 1;
    }
    throw error;
  }

  applyLogLevel(config.logLevel);
  for (const warning of configWarnings(config.stream)) {
    logger.warn(warning);
  }

  const controller = new RunController({
    acquirer: AcquisitionEngine.create({
      directTimeoutMs: config.acquisition.directTimeoutMs,
      driveTimeoutMs: config.acquisition.driveTimeoutMs,
      fallbackTimeoutMs: config.acquisition.fallbackTimeoutMs,
      logger: logger.child({ component: 'acquisition' }),
    }),
    probe: new FFProbe({ logger: logger.child({ component: 'ffprobe' }) }),
    supervisor: new StreamSupervisor({
      launcher: new FFmpegLauncher(),
      restartDelayMs: config.supervisor.restartDelayMs,
      maxSessions: config.supervisor.maxSessions,
      logger: logger.child({ component: 'supervisor' }),
    }),
  });

  const outcome = await controller.run(config, signal);
  return outcome.exitCode;
}

/**
 * Streamer Configuration
 * 
 * Environment → typed config. dotenv is loaded by the entry point; this
 * module only parses what it is given, so tests can pass a plain object.
 */

import { z } from 'zod';
import { ConfigurationError } from '@loopcast/core';
import { isNonEmptyString } from '@loopcast/utils';
import {
  DEFAULT_ASPECT_RATIO,
  DEFAULT_QUALITY,
  DEFAULT_RTMP_URL,
  MAX_SESSIONS,
  RESTART_DELAY_MS,
  deriveEncodingPlan,
  isAspectRatio,
  isQualityTier,
  parseQualityHeight,
} from '@loopcast/streaming';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

// Unset and blank variables both mean "use the default"
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const text = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const milliseconds = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(fallback));

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  // Stream
  YOUTUBE_STREAM_KEY: text(''),
  VIDEO_URL: text(''),
  VIDEO_QUALITY: text(DEFAULT_QUALITY),
  ASPECT_RATIO: text(DEFAULT_ASPECT_RATIO),
  RTMP_URL: text(DEFAULT_RTMP_URL),
  VIDEO_FILE: text('video.mp4'),

  // Supervisor
  STREAM_RESTART_DELAY_MS: milliseconds(RESTART_DELAY_MS),
  STREAM_MAX_SESSIONS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(MAX_SESSIONS)
  ),

  // Acquisition
  DOWNLOAD_TIMEOUT_MS: milliseconds(30000),
  GDRIVE_TIMEOUT_MS: milliseconds(60000),
  FALLBACK_TIMEOUT_MS: milliseconds(30 * 60 * 1000),
});

export interface StreamConfig {
  streamKey: string;
  videoUrl: string;
  quality: string;
  aspectRatio: string;
  rtmpUrl: string;
}

export interface AppConfig {
  logLevel: LogLevel;
  stream: StreamConfig;
  videoFile: string;
  supervisor: {
    restartDelayMs: number;
    maxSessions: number;
  };
  acquisition: {
    directTimeoutMs: number;
    driveTimeoutMs: number;
    fallbackTimeoutMs: number;
  };
}

/**
 * Command-line values that win over the environment
 */
export interface ConfigOverrides {
  videoUrl?: string;
  quality?: string;
  aspectRatio?: string;
  videoFile?: string;
}

/**
 * Parse the environment
 * 
 * Stream key and URL are not required here (`plan` works without them);
 * call validateStreamConfig before touching the network.
 * 
 * @throws ConfigurationError listing every malformed variable
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): AppConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const fields = [...new Set(parseResult.error.issues.map(issue => issue.path.join('.')))];
    throw new ConfigurationError(`Invalid environment configuration: ${fields.join(', ')}`, fields);
  }

  const parsed = parseResult.data;

  return {
    logLevel: parsed.LOG_LEVEL,
    stream: {
      streamKey: parsed.YOUTUBE_STREAM_KEY,
      videoUrl: overrides.videoUrl?.trim() || parsed.VIDEO_URL,
      quality: overrides.quality?.trim() || parsed.VIDEO_QUALITY,
      aspectRatio: overrides.aspectRatio?.trim() || parsed.ASPECT_RATIO,
      rtmpUrl: parsed.RTMP_URL,
    },
    videoFile: overrides.videoFile?.trim() || parsed.VIDEO_FILE,
    supervisor: {
      restartDelayMs: parsed.STREAM_RESTART_DELAY_MS,
      maxSessions: parsed.STREAM_MAX_SESSIONS,
    },
    acquisition: {
      directTimeoutMs: parsed.DOWNLOAD_TIMEOUT_MS,
      driveTimeoutMs: parsed.GDRIVE_TIMEOUT_MS,
      fallbackTimeoutMs: parsed.FALLBACK_TIMEOUT_MS,
    },
  };
}

/**
 * Values that are accepted but fall back to defaults in the encoding plan
 */
export function configWarnings(stream: StreamConfig): string[] {
  const warnings: string[] = [];
  if (!isQualityTier(stream.quality)) {
    const plan = deriveEncodingPlan(stream.quality, stream.aspectRatio);
    const output = `${plan.width}x${plan.height} at ${plan.videoBitrate}`;
    warnings.push(parseQualityHeight(stream.quality) === null
      ? `Unknown VIDEO_QUALITY "${stream.quality}", streaming at ${output}`
      : `VIDEO_QUALITY "${stream.quality}" is not a standard tier, streaming at ${output}`);
  }
  if (!isAspectRatio(stream.aspectRatio)) {
    warnings.push(`Unknown ASPECT_RATIO "${stream.aspectRatio}", using ${DEFAULT_ASPECT_RATIO}`);
  }
  return warnings;
}

/**
 * @throws ConfigurationError when the stream key or source URL is missing
 */
export function validateStreamConfig(stream: StreamConfig): void {
  if (!isNonEmptyString(stream.streamKey)) {
    throw new ConfigurationError('YOUTUBE_STREAM_KEY not set', ['YOUTUBE_STREAM_KEY']);
  }
  if (!isNonEmptyString(stream.videoUrl)) {
    throw new ConfigurationError('VIDEO_URL not set', ['VIDEO_URL']);
  }
}

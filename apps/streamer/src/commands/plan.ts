/**
 * Plan Command
 * 
 * Show what `start` would stream with the current settings. No network,
 * no processes.
 */

import chalk from 'chalk';
import { getBinaryPath } from '@loopcast/core';
import {
  buildStreamArgs,
  buildStreamUrl,
  deriveEncodingPlan,
  redactStreamArgs,
} from '@loopcast/streaming';
import { maskSecret, truncate } from '@loopcast/utils';
import { configWarnings, loadConfig } from '../config/index.js';
import { applyLogLevel } from '../lib/logger.js';
import { printCommand, printHeader, printKeyValue, printWarning } from '../lib/output.js';
import { toOverrides, type StartOptions } from './start.js';

const KEY_PLACEHOLDER = '<stream-key>';

export function planCommand(options: StartOptions): void {
  const config = loadConfig(process.env, toOverrides(options));
  applyLogLevel(config.logLevel);
  const { stream } = config;
  const plan = deriveEncodingPlan(stream.quality, stream.aspectRatio);

  printHeader('Stream Plan');

  printKeyValue('Source', stream.videoUrl ? truncate(stream.videoUrl, 60) : chalk.red('not set'));
  printKeyValue('Stream key', stream.streamKey ? maskSecret(stream.streamKey) : chalk.red('not set'));
  printKeyValue('Working file', config.videoFile);
  printKeyValue('Quality', `${stream.quality} (${stream.aspectRatio})`);
  printKeyValue('Resolution', `${plan.width}x${plan.height}`);
  printKeyValue('Video', `${plan.videoCodec} ${plan.preset} ${plan.videoBitrate} (bufsize ${plan.bufferSize})`);
  printKeyValue('Audio', `${plan.audioCodec} ${plan.audioBitrate} @ ${plan.audioSampleRate} Hz`);
  printKeyValue('Restart delay', `${config.supervisor.restartDelayMs}ms`);
  printKeyValue('Max sessions', config.supervisor.maxSessions);

  console.log();
  console.log(chalk.bold('Command:'));

  const streamKey = stream.streamKey || KEY_PLACEHOLDER;
  const args = buildStreamArgs(plan, config.videoFile, buildStreamUrl(stream.rtmpUrl, streamKey));
  printCommand(getBinaryPath('ffmpeg'), redactStreamArgs(args, stream.streamKey));
  console.log();

  for (const warning of configWarnings(stream)) {
    printWarning(warning);
  }
  if (!stream.streamKey) {
    printWarning('YOUTUBE_STREAM_KEY not set');
  }
  if (!stream.videoUrl) {
    printWarning('VIDEO_URL not set');
  }
}

#!/usr/bin/env tsx
/**
 * Streamer Entry Point
 *
 * Downloads the configured video once, then keeps ffmpeg pushing it to
 * the RTMP endpoint until SIGINT/SIGTERM.
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigurationError } from '@loopcast/core';
import { logger } from './lib/logger.js';
import { printError } from './lib/output.js';
import { startCommand, type StartOptions } from './commands/start.js';
import { planCommand } from './commands/plan.js';
import { checkCommand } from './commands/check.js';

// Shared by every command; the first signal stops the stream cleanly
const shutdown = new AbortController();

const onSignal = (signal: NodeJS.Signals) => {
  if (shutdown.signal.aborted) {
    logger.warn({ signal }, 'Second signal received, forcing exit');
    process.exit(130);
  }
  logger.info({ signal }, 'Shutdown signal received, stopping stream');
  shutdown.abort();
};

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.fatal({ err: error }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: reason }, 'Unhandled rejection');
  process.exit(1);
});

const program = new Command();

program
  .name('loopcast')
  .description('Download one video and loop it to a live RTMP endpoint')
  .version('1.0.0');

const withSourceOptions = (command: Command): Command =>
  command
    .option('-u, --url <url>', 'Source video URL (overrides VIDEO_URL)')
    .option('-q, --quality <quality>', 'Quality tier, e.g. 720p (overrides VIDEO_QUALITY)')
    .option('-a, --aspect <ratio>', 'Aspect ratio: 16:9, 9:16, 4:3, 1:1 (overrides ASPECT_RATIO)')
    .option('-o, --output <path>', 'Working file path (overrides VIDEO_FILE)');

withSourceOptions(
  program
    .command('start', { isDefault: true })
    .description('Download the video and stream it until stopped')
).action(async (options: StartOptions) => {
  process.exitCode = await startCommand(options, shutdown.signal);
});

withSourceOptions(
  program
    .command('plan')
    .description('Show the encoding plan and ffmpeg command without streaming')
).action((options: StartOptions) => {
  try {
    planCommand(options);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    printError(error.message);
    process.exitCode = 1;
  }
});

program
  .command('check')
  .description('Check that ffmpeg, ffprobe and gdown can be executed')
  .action(async () => {
    process.exitCode = await checkCommand();
  });

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('loopcast --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync(process.argv);

/**
 * FFmpeg Launcher
 * 
 * Runs one encoder session to completion. No timeout: the session is
 * meant to run until ffmpeg exits on its own or the signal aborts.
 */

import { getBinaryPath } from '@loopcast/core';
import { executeCommand, type CommandRunner } from '@loopcast/utils';

export interface ProcessExit {
  exitCode: number;
  duration: number; // milliseconds
  outputTail: string[];
}

export interface LaunchOptions {
  signal: AbortSignal;
  onSpawn?: () => void;
}

/**
 * Starts the encoder and resolves when it exits.
 * Rejects only when the process cannot be started at all.
 */
export interface ProcessLauncher {
  launch(args: string[], options: LaunchOptions): Promise<ProcessExit>;
}

export interface FFmpegLauncherOptions {
  ffmpegPath?: string;
  runner?: CommandRunner;
  tailLines?: number;
}

export class FFmpegLauncher implements ProcessLauncher {
  private ffmpegPath: string;
  private runner: CommandRunner;
  private tailLines: number;

  constructor(options: FFmpegLauncherOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? getBinaryPath('ffmpeg');
    this.runner = options.runner ?? executeCommand;
    this.tailLines = options.tailLines ?? 20;
  }

  async launch(args: string[], options: LaunchOptions): Promise<ProcessExit> {
    const tail = new OutputTail(this.tailLines);

    const result = await this.runner(this.ffmpegPath, args, {
      timeout: 0,
      maxOutputSize: 64 * 1024,
      signal: options.signal,
      onSpawn: options.onSpawn,
      onStderr: chunk => tail.push(chunk),
    });

    return {
      exitCode: result.exitCode,
      duration: result.duration,
      outputTail: tail.lines(),
    };
  }
}

/**
 * Keeps the last N complete lines of a chunked stream.
 * ffmpeg redraws its status line with \r, so both \r and \n end a line.
 */
export class OutputTail {
  private buffer: string[] = [];
  private partial = '';

  constructor(private readonly maxLines: number) {}

  push(chunk: string): void {
    const parts = (this.partial + chunk).split(/\r\n|\r|\n/);
    this.partial = parts.pop() ?? '';

    for (const line of parts) {
      if (line.trim()) {
        this.buffer.push(line);
      }
    }
    if (this.buffer.length > this.maxLines) {
      this.buffer.splice(0, this.buffer.length - this.maxLines);
    }
  }

  lines(): string[] {
    const pending = this.partial.trim() ? [this.partial] : [];
    return [...this.buffer, ...pending].slice(-this.maxLines);
  }
}

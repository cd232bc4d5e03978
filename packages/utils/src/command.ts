/**
 * Command Execution Wrapper
 * 
 * Safe wrapper for executing external commands with:
 * - Timeout handling
 * - Output capture
 * - Error handling
 * - Signal forwarding
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds, 0 disables the timer
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
  onStderr?: (chunk: string) => void;
  onSpawn?: () => void;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command safely
 * 
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
    onStderr,
    onSpawn,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    if (onSpawn) {
      child.once('spawn', onSpawn);
    }

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | undefined;

    const terminate = () => {
      child.kill('SIGTERM');
      // Force kill after 10 seconds
      killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
      killTimer.unref();
    };

    const timeoutId = timeout > 0
      ? setTimeout(() => {
          timedOut = true;
          terminate();
        }, timeout)
      : undefined;

    // Handle abort signal
    const onAbort = () => terminate();
    if (signal?.aborted) {
      terminate();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const cleanup = () => {
      clearTimeout(timeoutId);
      clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    // Capture stdout with size limit
    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    // Capture stderr with size limit
    child.stderr?.on('data', (data: Buffer) => {
      const chunk = data.toString();
      onStderr?.(chunk);
      if (stderrSize < maxOutputSize) {
        stderr += chunk;
        stderrSize += data.length;
      }
    });

    // Handle process exit
    child.on('close', (code, exitSignal) => {
      cleanup();

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    // Handle spawn errors
    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}

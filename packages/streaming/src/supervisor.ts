/**
 * Stream Supervisor
 * 
 * Keeps one encoder session alive around the clock. Every exit, whatever
 * the exit code, is transient: wait, then launch again. Only the abort
 * signal or the session ceiling end the loop.
 * 
 *   STARTING → RUNNING → RESTARTING → STARTING → ...
 *                 ↘ STOPPED (aborted)    ↘ STOPPED (aborted / ceiling)
 */

import {
  SessionStateMachine,
  StreamProcessError,
  errorMessage,
  type SessionStateTransition,
} from '@loopcast/core';
import { logger as rootLogger, sleep as defaultSleep, formatDuration, type Logger } from '@loopcast/utils';
import type { ProcessExit, ProcessLauncher } from './ffmpeg.js';

export const RESTART_DELAY_MS = 5000;
export const MAX_SESSIONS = 999;

export type SupervisorStatus = 'cancelled' | 'exhausted';

export interface SupervisorOutcome {
  status: SupervisorStatus;
  sessions: number; // encoder launches attempted
  restarts: number; // launches that followed an exit
  history: ReadonlyArray<SessionStateTransition>;
}

export interface StreamSupervisorOptions {
  launcher: ProcessLauncher;
  restartDelayMs?: number;
  maxSessions?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

export class StreamSupervisor {
  private launcher: ProcessLauncher;
  private restartDelayMs: number;
  private maxSessions: number;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private logger: Logger;

  constructor(options: StreamSupervisorOptions) {
    this.launcher = options.launcher;
    this.restartDelayMs = options.restartDelayMs ?? RESTART_DELAY_MS;
    this.maxSessions = options.maxSessions ?? MAX_SESSIONS;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? rootLogger.child({ component: 'supervisor' });
  }

  /**
   * Run the encoder until cancelled or the session ceiling is reached
   */
  async run(args: string[], signal: AbortSignal): Promise<SupervisorOutcome> {
    const machine = new SessionStateMachine(`stream-${Date.now()}`);
    let sessions = 0;

    this.logger.info({
      restartDelayMs: this.restartDelayMs,
      maxSessions: this.maxSessions,
    }, 'LIVE - stream running 24/7');

    while (!signal.aborted) {
      sessions++;
      this.logger.info({ session: sessions }, 'Stream session starting');

      const exit = await this.runSession(machine, args, signal, sessions);

      if (signal.aborted) {
        break;
      }

      machine.transitionTo(
        'RESTARTING',
        exit ? `exit ${exit.exitCode}` : 'launch error',
        exit ? { exitCode: exit.exitCode } : undefined
      );

      if (sessions >= this.maxSessions) {
        machine.stop('session ceiling reached', { sessions });
        this.logger.warn({ sessions }, 'Session ceiling reached, supervisor stopping');
        return this.outcome('exhausted', machine, sessions);
      }

      await this.sleep(this.restartDelayMs, signal);

      if (signal.aborted) {
        break;
      }

      machine.transitionTo('STARTING');
    }

    machine.stop('cancelled');
    this.logger.info({ sessions }, 'Stream stopped by user');
    return this.outcome('cancelled', machine, sessions);
  }

  /**
   * One encoder lifetime. Resolves with the exit, or undefined when the
   * launch itself failed; never rejects.
   */
  private async runSession(
    machine: SessionStateMachine,
    args: string[],
    signal: AbortSignal,
    session: number
  ): Promise<ProcessExit | undefined> {
    try {
      const exit = await this.launcher.launch(args, {
        signal,
        onSpawn: () => machine.transitionTo('RUNNING', 'process launched'),
      });

      if (!signal.aborted) {
        this.logger.warn({
          session,
          exitCode: exit.exitCode,
          ranFor: formatDuration(exit.duration),
          output: exit.outputTail.slice(-5),
        }, 'Stream ended, restarting');
      }

      return exit;
    } catch (error) {
      if (!signal.aborted) {
        const failure = new StreamProcessError(session, `Stream error: ${errorMessage(error)}`, { cause: error });
        this.logger.error({ session, error: failure.message }, 'Stream error, restarting');
      }
      return undefined;
    }
  }

  private outcome(
    status: SupervisorStatus,
    machine: SessionStateMachine,
    sessions: number
  ): SupervisorOutcome {
    return {
      status,
      sessions,
      restarts: machine.countTransitionsTo('STARTING'),
      history: machine.getHistory(),
    };
  }
}

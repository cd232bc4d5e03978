/**
 * Custom Error Classes
 */

import type { SessionState } from '../stateMachine.js';

/**
 * Base error class for all loopcast errors
 */
export class LoopcastError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LoopcastError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A required setting is missing or malformed
 */
export class ConfigurationError extends LoopcastError {
  public readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', { fields });
    this.name = 'ConfigurationError';
    this.fields = fields;
  }
}

export type AcquisitionFailureReason =
  | 'UNSUPPORTED_URL'
  | 'FILE_ID_NOT_FOUND'
  | 'TRANSPORT'
  | 'HTTP_STATUS'
  | 'HTML_RESPONSE'
  | 'UNDERSIZED'
  | 'FALLBACK_FAILED'
  | 'MISSING_FILE';

/**
 * The source video could not be turned into a usable local file
 */
export class AcquisitionError extends LoopcastError {
  public readonly reason: AcquisitionFailureReason;

  constructor(
    reason: AcquisitionFailureReason,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, 'ACQUISITION_ERROR', { reason, ...details }, options);
    this.name = 'AcquisitionError';
    this.reason = reason;
  }
}

/**
 * The media duration could not be determined
 */
export class ProbeError extends LoopcastError {
  constructor(filePath: string, message: string) {
    super(message, 'PROBE_ERROR', { filePath });
    this.name = 'ProbeError';
  }
}

/**
 * The encoder failed to launch or crashed while monitored
 */
export class StreamProcessError extends LoopcastError {
  constructor(session: number, message: string, options?: { cause?: unknown }) {
    super(message, 'STREAM_PROCESS_ERROR', { session }, options);
    this.name = 'StreamProcessError';
  }
}

/**
 * Operator-initiated stop
 */
export class CancellationError extends LoopcastError {
  constructor(stage: string) {
    super(`Cancelled during ${stage}`, 'CANCELLED', { stage });
    this.name = 'CancellationError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends LoopcastError {
  constructor(
    sessionId: string,
    fromState: SessionState,
    toState: SessionState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { sessionId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends LoopcastError {
  public readonly exitCode: number;

  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `Command failed with exit code ${exitCode}`,
      'COMMAND_EXECUTION_ERROR',
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
    this.exitCode = exitCode;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * @loopcast/core
 * 
 * Core package containing:
 * - Stream session state machine
 * - Error taxonomy
 * - External binary resolution
 */

// State machine
export {
  SESSION_STATES,
  SessionStateMachine,
  isValidTransition,
  getNextStates,
} from './stateMachine.js';

export type {
  SessionState,
  SessionStateTransition,
} from './stateMachine.js';

// Errors
export {
  LoopcastError,
  ConfigurationError,
  AcquisitionError,
  ProbeError,
  StreamProcessError,
  CancellationError,
  StateTransitionError,
  CommandExecutionError,
  errorMessage,
  type AcquisitionFailureReason,
} from './errors/index.js';

// Binary Configuration
export {
  getBinariesConfig,
  binaries,
  getBinaryPath,
  isBinaryAvailable,
  type BinaryConfig,
  type BinariesConfig,
  type BinaryName,
} from './config/binaries.js';

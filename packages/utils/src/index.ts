/**
 * @loopcast/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Time and display formatting
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  ensureParentDir,
  getFileSizeBytes,
  safeFileSize,
  removeFile,
} from './file.js';

// Type guards
export {
  isString,
  isNonEmptyString,
} from './guards.js';

// Time utilities
export {
  sleep,
  formatDuration,
  formatClock,
} from './time.js';

// Display formatting
export {
  formatMegabytes,
  maskSecret,
  truncate,
} from './format.js';

// Logger
export {
  logger,
  createLogger,
  resolveLogLevel,
  setLogLevel,
  type Logger,
} from './logger.js';

/**
 * @loopcast/acquisition
 * 
 * Download acquisition layer.
 * 
 * Responsibilities:
 * - Classify source URLs (direct vs Google Drive) and extract Drive file ids
 * - Stream downloads to disk with coarse progress logging
 * - Defeat Drive's large-file confirmation page, falling back to gdown
 * - Reject undersized results (error pages posing as media)
 */

// Link detection
export {
  LinkDetector,
  linkDetector,
  isLargeFileHostUrl,
  extractFileId,
  type LinkType,
  type DetectedLink,
  type LinkMetadata,
} from './linkDetector.js';

// HTTP transport
export {
  UndiciTransport,
  type HttpTransport,
  type HttpResponse,
  type HttpRequestOptions,
  type UndiciTransportConfig,
} from './transport.js';

// Strategies
export { DirectHttpStrategy, type DirectHttpOptions } from './clients/direct.js';
export {
  DriveConfirmStrategy,
  findConfirmToken,
  buildDriveDownloadUrl,
  type DriveConfirmOptions,
  type ConfirmToken,
} from './clients/gdrive.js';
export { GdownStrategy, buildFallbackUrl, type GdownOptions } from './clients/gdown.js';

// Engine
export {
  AcquisitionEngine,
  type AcquisitionStrategies,
  type AcquisitionEngineOptions,
  type AcquisitionEngineConfig,
} from './engine.js';

// Types
export {
  MIN_VALID_FILE_SIZE,
  isValidDownload,
  type AcquisitionStrategy,
  type AcquisitionTarget,
  type DownloadResult,
  type StrategyName,
} from './types.js';

/**
 * @loopcast/streaming
 * 
 * Live push layer.
 * 
 * Responsibilities:
 * - Derive the encoding plan from quality and aspect ratio
 * - Build the looping ffmpeg → RTMP argument list
 * - Launch ffmpeg and restart it whenever it exits
 */

// Encoding plan
export {
  QUALITY_TIERS,
  ASPECT_RATIOS,
  DEFAULT_QUALITY,
  DEFAULT_ASPECT_RATIO,
  BITRATE_BY_HEIGHT,
  AUDIO_BITRATE,
  AUDIO_SAMPLE_RATE,
  KEYFRAME_INTERVAL,
  deriveEncodingPlan,
  resolveResolution,
  parseQualityHeight,
  isQualityTier,
  isAspectRatio,
  type QualityTier,
  type AspectRatio,
  type EncodingPlan,
} from './encodingPlan.js';

// Command building
export {
  DEFAULT_RTMP_URL,
  buildStreamUrl,
  buildScaleFilter,
  buildStreamArgs,
  redactStreamArgs,
} from './commandBuilder.js';

// Process launch
export {
  FFmpegLauncher,
  OutputTail,
  type ProcessLauncher,
  type ProcessExit,
  type LaunchOptions,
  type FFmpegLauncherOptions,
} from './ffmpeg.js';

// Supervision
export {
  StreamSupervisor,
  RESTART_DELAY_MS,
  MAX_SESSIONS,
  type SupervisorOutcome,
  type SupervisorStatus,
  type StreamSupervisorOptions,
} from './supervisor.js';

/**
 * Encoding Plan
 * 
 * Derives the live-stream encoding parameters from a quality tier and an
 * aspect ratio. Pure: the same inputs always give the same plan.
 */

export const QUALITY_TIERS = ['360p', '480p', '720p', '1080p', '1440p', '2160p'] as const;
export type QualityTier = typeof QUALITY_TIERS[number];

export const ASPECT_RATIOS = ['16:9', '9:16', '4:3', '1:1'] as const;
export type AspectRatio = typeof ASPECT_RATIOS[number];

export const DEFAULT_QUALITY: QualityTier = '720p';
export const DEFAULT_ASPECT_RATIO: AspectRatio = '16:9';

// Used when the quality string is not of the <height>p shape
const FALLBACK_RESOLUTION = { width: 1280, height: 720 };

const ASPECT_FACTORS: Record<AspectRatio, { num: number; den: number }> = {
  '16:9': { num: 16, den: 9 },
  '9:16': { num: 9, den: 16 },
  '4:3': { num: 4, den: 3 },
  '1:1': { num: 1, den: 1 },
};

/**
 * Video bitrate in kbit/s per output height
 */
export const BITRATE_BY_HEIGHT: Readonly<Record<number, number>> = {
  360: 800,
  480: 1200,
  720: 2500,
  1080: 4500,
  1440: 9000,
  2160: 20000,
};

const DEFAULT_BITRATE_KBPS = 2500;

export const AUDIO_BITRATE = '128k';
export const AUDIO_SAMPLE_RATE = 44100;
export const KEYFRAME_INTERVAL = 60;

export interface EncodingPlan {
  width: number;
  height: number;
  videoCodec: 'libx264';
  preset: string;
  videoBitrate: string;
  maxRate: string;
  bufferSize: string;
  pixelFormat: string;
  keyframeInterval: number;
  audioCodec: 'aac';
  audioBitrate: string;
  audioSampleRate: number;
}

export function isQualityTier(value: string): value is QualityTier {
  return QUALITY_TIERS.some(tier => tier === value);
}

export function isAspectRatio(value: string): value is AspectRatio {
  return ASPECT_RATIOS.some(ratio => ratio === value);
}

/**
 * Height in pixels from a `<height>p` quality string, or null when the
 * string has another shape
 */
export function parseQualityHeight(quality: string): number | null {
  const match = /^(\d+)p$/.exec(quality);
  const height = match?.[1] ? Number.parseInt(match[1], 10) : 0;
  return height > 0 ? height : null;
}

/**
 * Output resolution for a quality/aspect pair. Width is rounded up to
 * the next even number since yuv420p needs even dimensions.
 */
export function resolveResolution(quality: string, aspectRatio: string): { width: number; height: number } {
  const height = parseQualityHeight(quality);
  if (height === null) {
    return { ...FALLBACK_RESOLUTION };
  }

  const { num, den } = isAspectRatio(aspectRatio)
    ? ASPECT_FACTORS[aspectRatio]
    : ASPECT_FACTORS[DEFAULT_ASPECT_RATIO];

  const width = Math.trunc((height * num) / den);
  return { width: width % 2 === 0 ? width : width + 1, height };
}

export function deriveEncodingPlan(quality: string, aspectRatio: string): EncodingPlan {
  const { width, height } = resolveResolution(quality, aspectRatio);
  const bitrateKbps = BITRATE_BY_HEIGHT[height] ?? DEFAULT_BITRATE_KBPS;

  return {
    width,
    height,
    videoCodec: 'libx264',
    preset: 'veryfast',
    videoBitrate: `${bitrateKbps}k`,
    maxRate: `${bitrateKbps}k`,
    bufferSize: `${bitrateKbps * 2}k`,
    pixelFormat: 'yuv420p',
    keyframeInterval: KEYFRAME_INTERVAL,
    audioCodec: 'aac',
    audioBitrate: AUDIO_BITRATE,
    audioSampleRate: AUDIO_SAMPLE_RATE,
  };
}

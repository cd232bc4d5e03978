/**
 * FFmpeg Command Builder
 * 
 * Argument list for the looping live push:
 * input looped forever at native rate, scaled and padded into the plan's
 * frame, H.264 + AAC, FLV over RTMP.
 */

import { maskSecret } from '@loopcast/utils';
import type { EncodingPlan } from './encodingPlan.js';

export const DEFAULT_RTMP_URL = 'rtmp://a.rtmp.youtube.com/live2/';

/**
 * Join the RTMP prefix and the stream key
 */
export function buildStreamUrl(rtmpPrefix: string, streamKey: string): string {
  const prefix = rtmpPrefix.endsWith('/') ? rtmpPrefix : `${rtmpPrefix}/`;
  return `${prefix}${streamKey}`;
}

/**
 * Letterbox/pillarbox into width×height without distorting the source
 */
export function buildScaleFilter(width: number, height: number): string {
  return [
    `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`,
  ].join(',');
}

export function buildStreamArgs(plan: EncodingPlan, inputFile: string, destination: string): string[] {
  return [
    '-stream_loop', '-1',
    '-re',
    '-i', inputFile,
    '-vf', buildScaleFilter(plan.width, plan.height),
    '-c:v', plan.videoCodec,
    '-preset', plan.preset,
    '-b:v', plan.videoBitrate,
    '-maxrate', plan.maxRate,
    '-bufsize', plan.bufferSize,
    '-pix_fmt', plan.pixelFormat,
    '-g', String(plan.keyframeInterval),
    '-c:a', plan.audioCodec,
    '-b:a', plan.audioBitrate,
    '-ar', String(plan.audioSampleRate),
    '-f', 'flv',
    destination,
  ];
}

/**
 * Copy of the argument list that is safe to print or log
 */
export function redactStreamArgs(args: string[], streamKey: string): string[] {
  if (!streamKey) {
    return [...args];
  }
  const masked = maskSecret(streamKey);
  return args.map(arg => arg.split(streamKey).join(masked));
}

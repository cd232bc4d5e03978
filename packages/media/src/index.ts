/**
 * @loopcast/media
 * 
 * Media probing. Duration is informational only and never blocks
 * streaming.
 */

export { FFProbe, parseDuration, type FFProbeOptions } from './probes/ffprobe.js';

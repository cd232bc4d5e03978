import { describe, it, expect } from 'vitest';
import { getBinariesConfig } from './binaries.js';

describe('getBinariesConfig', () => {
  it('prefers an env path that exists', () => {
    const config = getBinariesConfig({ FFMPEG_PATH: process.execPath });

    expect(config.ffmpeg).toEqual({
      name: 'ffmpeg',
      envVar: 'FFMPEG_PATH',
      resolvedPath: process.execPath,
      source: 'env',
    });
  });

  it('falls back to the bare name when the env path is missing', () => {
    const config = getBinariesConfig({ GDOWN_PATH: '/nonexistent/gdown' });

    expect(config.gdown.resolvedPath).toBe('gdown');
    expect(config.gdown.source).toBe('path');
  });
});

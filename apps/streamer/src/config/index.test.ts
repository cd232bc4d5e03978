import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@loopcast/core';
import { configWarnings, loadConfig, validateStreamConfig } from './index.js';

const baseEnv = {
  YOUTUBE_STREAM_KEY: 'test-secret',
  VIDEO_URL: 'https://example.com/video.mp4',
};

function configError(run: () => unknown): ConfigurationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig(baseEnv)).toEqual({
      logLevel: 'info',
      stream: {
        streamKey: 'test-secret',
        videoUrl: 'https://example.com/video.mp4',
        quality: '720p',
        aspectRatio: '16:9',
        rtmpUrl: 'rtmp://a.rtmp.youtube.com/live2/',
      },
      videoFile: 'video.mp4',
      supervisor: {
        restartDelayMs: 5000,
        maxSessions: 999,
      },
      acquisition: {
        directTimeoutMs: 30000,
        driveTimeoutMs: 60000,
        fallbackTimeoutMs: 1800000,
      },
    });
  });

  it('parses numeric settings', () => {
    const config = loadConfig({
      ...baseEnv,
      STREAM_RESTART_DELAY_MS: '250',
      STREAM_MAX_SESSIONS: '3',
      GDRIVE_TIMEOUT_MS: '1000',
    });

    expect(config.supervisor).toEqual({ restartDelayMs: 250, maxSessions: 3 });
    expect(config.acquisition.driveTimeoutMs).toBe(1000);
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({
      ...baseEnv,
      VIDEO_QUALITY: '',
      ASPECT_RATIO: '  ',
      STREAM_MAX_SESSIONS: '',
    });

    expect(config.stream.quality).toBe('720p');
    expect(config.stream.aspectRatio).toBe('16:9');
    expect(config.supervisor.maxSessions).toBe(999);
  });

  it('trims string values', () => {
    const config = loadConfig({ ...baseEnv, VIDEO_URL: '  https://example.com/a.mp4\n' });
    expect(config.stream.videoUrl).toBe('https://example.com/a.mp4');
  });

  it('rejects malformed numbers, listing each field', () => {
    const error = configError(() => loadConfig({
      ...baseEnv,
      STREAM_RESTART_DELAY_MS: 'soon',
      DOWNLOAD_TIMEOUT_MS: '-1',
    }));

    expect(error.fields).toEqual(['STREAM_RESTART_DELAY_MS', 'DOWNLOAD_TIMEOUT_MS']);
    expect(error.message).toBe(
      'Invalid environment configuration: STREAM_RESTART_DELAY_MS, DOWNLOAD_TIMEOUT_MS'
    );
  });

  it('requires at least one session', () => {
    const error = configError(() => loadConfig({ ...baseEnv, STREAM_MAX_SESSIONS: '0' }));
    expect(error.fields).toEqual(['STREAM_MAX_SESSIONS']);
  });

  it('rejects an unknown log level', () => {
    const error = configError(() => loadConfig({ ...baseEnv, LOG_LEVEL: 'loud' }));
    expect(error.fields).toEqual(['LOG_LEVEL']);
  });

  it('lets command-line overrides win', () => {
    const config = loadConfig(
      { ...baseEnv, VIDEO_QUALITY: '480p' },
      { videoUrl: 'https://example.com/other.mp4', quality: '1080p', aspectRatio: '9:16', videoFile: '/tmp/in.mp4' }
    );

    expect(config.stream.videoUrl).toBe('https://example.com/other.mp4');
    expect(config.stream.quality).toBe('1080p');
    expect(config.stream.aspectRatio).toBe('9:16');
    expect(config.videoFile).toBe('/tmp/in.mp4');
  });

  it('ignores empty overrides', () => {
    const config = loadConfig({ ...baseEnv, VIDEO_QUALITY: '480p' }, { quality: '' });
    expect(config.stream.quality).toBe('480p');
  });

  it('accepts unknown quality strings', () => {
    expect(loadConfig({ ...baseEnv, VIDEO_QUALITY: 'best' }).stream.quality).toBe('best');
  });

  it('does not require the stream key or URL', () => {
    const config = loadConfig({});
    expect(config.stream.streamKey).toBe('');
    expect(config.stream.videoUrl).toBe('');
  });
});

describe('validateStreamConfig', () => {
  it('passes a complete stream config', () => {
    expect(() => validateStreamConfig(loadConfig(baseEnv).stream)).not.toThrow();
  });

  it('names a missing stream key', () => {
    const error = configError(() => validateStreamConfig(loadConfig({ VIDEO_URL: baseEnv.VIDEO_URL }).stream));
    expect(error.message).toBe('YOUTUBE_STREAM_KEY not set');
    expect(error.fields).toEqual(['YOUTUBE_STREAM_KEY']);
  });

  it('treats a whitespace key as missing', () => {
    const stream = loadConfig({ ...baseEnv, YOUTUBE_STREAM_KEY: '   ' }).stream;
    expect(() => validateStreamConfig(stream)).toThrow('YOUTUBE_STREAM_KEY not set');
  });

  it('names a missing URL', () => {
    const stream = loadConfig({ YOUTUBE_STREAM_KEY: 'test-secret' }).stream;
    expect(() => validateStreamConfig(stream)).toThrow('VIDEO_URL not set');
  });
});

describe('configWarnings', () => {
  it('is empty for known values', () => {
    expect(configWarnings(loadConfig(baseEnv).stream)).toEqual([]);
  });

  it('warns about values the encoding plan will replace', () => {
    const stream = loadConfig({ ...baseEnv, VIDEO_QUALITY: 'best', ASPECT_RATIO: '21:9' }).stream;
    expect(configWarnings(stream)).toEqual([
      'Unknown VIDEO_QUALITY "best", streaming at 1280x720 at 2500k',
      'Unknown ASPECT_RATIO "21:9", using 16:9',
    ]);
  });

  it('reports the real output for a non-standard height', () => {
    const stream = loadConfig({ ...baseEnv, VIDEO_QUALITY: '500p' }).stream;
    // 500 * 16 / 9 = 888.9, truncated to 888
    expect(configWarnings(stream)).toEqual([
      'VIDEO_QUALITY "500p" is not a standard tier, streaming at 888x500 at 2500k',
    ]);
  });
});

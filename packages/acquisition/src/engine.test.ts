import { describe, it, expect, vi } from 'vitest';
import { AcquisitionError, CancellationError } from '@loopcast/core';
import { logger, type Logger } from '@loopcast/utils';
import { AcquisitionEngine } from './engine.js';
import type { AcquisitionStrategy, AcquisitionTarget, DownloadResult, StrategyName } from './types.js';

const DRIVE_URL = 'https://drive.google.com/file/d/driveFile01/view?usp=sharing';
const DIRECT_URL = 'https://cdn.example.com/loop.mp4';
const OUTPUT = '/tmp/loopcast/video.mp4';

function result(strategy: StrategyName, fileSize: number, success = true): DownloadResult {
  return { success, strategy, filePath: OUTPUT, fileSize, duration: 1 };
}

type FetchImpl = (target: AcquisitionTarget, outputPath: string, signal?: AbortSignal) => Promise<DownloadResult>;

function strategy(name: StrategyName, impl: FetchImpl) {
  const fetch = vi.fn(impl);
  const value: AcquisitionStrategy = { name, fetch };
  return { value, fetch };
}

function setup(impls: { direct?: FetchImpl; confirm?: FetchImpl; fallback?: FetchImpl }, log?: Logger) {
  const unexpected: FetchImpl = async () => {
    throw new Error('strategy should not run');
  };
  const direct = strategy('direct', impls.direct ?? unexpected);
  const confirm = strategy('gdrive-confirm', impls.confirm ?? unexpected);
  const fallback = strategy('gdown', impls.fallback ?? unexpected);
  const engine = new AcquisitionEngine({
    direct: direct.value,
    confirm: confirm.value,
    fallback: fallback.value,
  }, { logger: log });
  return { engine, direct: direct.fetch, confirm: confirm.fetch, fallback: fallback.fetch };
}

describe('AcquisitionEngine with Drive URLs', () => {
  it('returns the handshake result when it is valid', async () => {
    const { engine, confirm, fallback } = setup({
      confirm: async () => result('gdrive-confirm', 2_000_000),
    });

    const downloaded = await engine.acquire(DRIVE_URL, OUTPUT);

    expect(downloaded.strategy).toBe('gdrive-confirm');
    expect(confirm).toHaveBeenCalledWith(
      { url: DRIVE_URL, fileId: 'driveFile01' },
      OUTPUT,
      undefined
    );
    expect(fallback).not.toHaveBeenCalled();
  });

  it('falls back when the handshake throws', async () => {
    const { engine, fallback } = setup({
      confirm: async () => {
        throw new AcquisitionError('HTML_RESPONSE', 'Got HTML response instead of the file');
      },
      fallback: async () => result('gdown', 3_000_000),
    });

    const downloaded = await engine.acquire(DRIVE_URL, OUTPUT);

    expect(downloaded.strategy).toBe('gdown');
    expect(fallback).toHaveBeenCalledWith({ url: DRIVE_URL, fileId: 'driveFile01' }, OUTPUT, undefined);
  });

  it('falls back when the handshake result is undersized', async () => {
    const { engine, fallback } = setup({
      confirm: async () => result('gdrive-confirm', 4_096),
      fallback: async () => result('gdown', 10_001),
    });

    const downloaded = await engine.acquire(DRIVE_URL, OUTPUT);

    expect(fallback).toHaveBeenCalledTimes(1);
    expect(downloaded.fileSize).toBe(10_001);
  });

  it('fails when the fallback also comes back invalid', async () => {
    const { engine } = setup({
      confirm: async () => result('gdrive-confirm', 500),
      fallback: async () => ({ ...result('gdown', 0, false), error: 'Command failed with exit code 1' }),
    });

    await expect(engine.acquire(DRIVE_URL, OUTPUT)).rejects.toMatchObject({
      reason: 'FALLBACK_FAILED',
      message: 'Alternative download failed: Command failed with exit code 1',
    });
  });

  it('wraps a throwing fallback', async () => {
    const { engine } = setup({
      confirm: async () => result('gdrive-confirm', 500),
      fallback: async () => {
        throw new Error('disk full');
      },
    });

    await expect(engine.acquire(DRIVE_URL, OUTPUT)).rejects.toMatchObject({
      reason: 'FALLBACK_FAILED',
      message: 'Alternative download failed: disk full',
    });
  });

  it('fails fast when no file id can be extracted', async () => {
    const { engine, confirm, fallback } = setup({});

    await expect(engine.acquire('https://drive.google.com/drive/my-drive', OUTPUT)).rejects.toMatchObject({
      reason: 'FILE_ID_NOT_FOUND',
    });
    expect(confirm).not.toHaveBeenCalled();
    expect(fallback).not.toHaveBeenCalled();
  });

  it('stops without falling back once cancelled', async () => {
    const controller = new AbortController();
    const { engine, fallback } = setup({
      confirm: async () => {
        controller.abort();
        throw new Error('This operation was aborted');
      },
    });

    await expect(engine.acquire(DRIVE_URL, OUTPUT, controller.signal)).rejects.toBeInstanceOf(CancellationError);
    expect(fallback).not.toHaveBeenCalled();
  });
});

describe('AcquisitionEngine with direct URLs', () => {
  it('returns a valid direct download', async () => {
    const { engine, direct } = setup({
      direct: async () => result('direct', 10_001),
    });

    await expect(engine.acquire(DIRECT_URL, OUTPUT)).resolves.toMatchObject({ strategy: 'direct' });
    expect(direct).toHaveBeenCalledWith({ url: DIRECT_URL }, OUTPUT, undefined);
  });

  it('logs the host and path of a direct URL', async () => {
    const log = logger.child({});
    const info = vi.spyOn(log, 'info');
    const { engine } = setup({ direct: async () => result('direct', 50_000) }, log);

    await engine.acquire(DIRECT_URL, OUTPUT);

    expect(info).toHaveBeenCalledWith(
      { domain: 'cdn.example.com', path: '/loop.mp4' },
      'Detected direct URL'
    );
  });

  it('rejects a file at the threshold without trying the fallback', async () => {
    const { engine, fallback } = setup({
      direct: async () => result('direct', 10_000),
    });

    await expect(engine.acquire(DIRECT_URL, OUTPUT)).rejects.toMatchObject({ reason: 'UNDERSIZED' });
    expect(fallback).not.toHaveBeenCalled();
  });

  it('maps transport exceptions to TRANSPORT failures', async () => {
    const { engine } = setup({
      direct: async () => {
        throw new Error('Headers Timeout Error');
      },
    });

    await expect(engine.acquire(DIRECT_URL, OUTPUT)).rejects.toMatchObject({
      reason: 'TRANSPORT',
      message: 'Download error: Headers Timeout Error',
    });
  });

  it('passes acquisition errors through unchanged', async () => {
    const { engine } = setup({
      direct: async () => {
        throw new AcquisitionError('HTTP_STATUS', 'Download failed with HTTP 403');
      },
    });

    await expect(engine.acquire(DIRECT_URL, OUTPUT)).rejects.toMatchObject({ reason: 'HTTP_STATUS' });
  });

  it('rejects an empty URL', async () => {
    const { engine } = setup({});

    await expect(engine.acquire('  ', OUTPUT)).rejects.toMatchObject({ reason: 'UNSUPPORTED_URL' });
  });
});

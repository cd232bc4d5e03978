import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FakeTransport, bytes } from '../testing/fakeTransport.js';
import { DirectHttpStrategy } from './direct.js';

const URL = 'https://cdn.example.com/media/loop.mp4';

describe('DirectHttpStrategy', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'loopcast-direct-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('streams the body to the output path', async () => {
    const transport = new FakeTransport([
      {
        headers: { 'content-length': '24576' },
        chunks: [bytes(8192, 0x01), bytes(8192, 0x02), bytes(8192, 0x03)],
      },
    ]);
    const outputPath = join(dir, 'nested', 'video.mp4');

    const result = await new DirectHttpStrategy(transport).fetch({ url: URL }, outputPath);

    expect(transport.requests).toEqual([{ url: URL, options: { timeoutMs: 30000, signal: undefined } }]);
    expect(result).toMatchObject({
      success: true,
      strategy: 'direct',
      filePath: outputPath,
      fileSize: 24576,
    });

    const written = await readFile(outputPath);
    expect(written[0]).toBe(0x01);
    expect(written[24575]).toBe(0x03);
  });

  it('honours a custom timeout', async () => {
    const transport = new FakeTransport([{ chunks: [bytes(20000)] }]);

    await new DirectHttpStrategy(transport, { timeoutMs: 5000 }).fetch({ url: URL }, join(dir, 'video.mp4'));

    expect(transport.requests[0]?.options.timeoutMs).toBe(5000);
  });

  it('rejects non-success status codes', async () => {
    const transport = new FakeTransport([{ statusCode: 404, chunks: [bytes(100)] }]);

    await expect(
      new DirectHttpStrategy(transport).fetch({ url: URL }, join(dir, 'video.mp4'))
    ).rejects.toMatchObject({
      reason: 'HTTP_STATUS',
      message: 'Download failed with HTTP 404',
    });
  });

  it('propagates transport errors', async () => {
    const transport = new FakeTransport([new Error('getaddrinfo ENOTFOUND cdn.example.com')]);

    await expect(
      new DirectHttpStrategy(transport).fetch({ url: URL }, join(dir, 'video.mp4'))
    ).rejects.toThrow('getaddrinfo ENOTFOUND cdn.example.com');
  });
});

import { describe, it, expect, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import {
  UndiciTransport,
  contentLength,
  cookieHeader,
  headerValue,
  parseSetCookies,
  readText,
} from './transport.js';
import { Readable } from 'node:stream';

describe('UndiciTransport', () => {
  const agent = new MockAgent();
  agent.disableNetConnect();

  afterEach(async () => {
    agent.assertNoPendingInterceptors();
  });

  it('performs a GET through the configured dispatcher', async () => {
    agent
      .get('https://cdn.example.com')
      .intercept({ path: '/loop.mp4', method: 'GET' })
      .reply(200, 'video-bytes', {
        headers: { 'content-type': 'video/mp4', 'content-length': '11' },
      });
    const transport = new UndiciTransport({ dispatcher: agent });

    const response = await transport.get('https://cdn.example.com/loop.mp4', { timeoutMs: 1000 });

    expect(response.statusCode).toBe(200);
    expect(headerValue(response.headers, 'Content-Type')).toBe('video/mp4');
    expect(contentLength(response.headers)).toBe(11);
    expect(await readText(response.body, 1024)).toBe('video-bytes');
  });
});

describe('header helpers', () => {
  it('reads the first value of a repeated header', () => {
    expect(headerValue({ 'x-cache': ['HIT', 'MISS'] }, 'x-cache')).toBe('HIT');
  });

  it('ignores missing or invalid content lengths', () => {
    expect(contentLength({})).toBeUndefined();
    expect(contentLength({ 'content-length': 'abc' })).toBeUndefined();
    expect(contentLength({ 'content-length': '0' })).toBeUndefined();
  });

  it('parses set-cookie lines into name/value pairs', () => {
    const cookies = parseSetCookies({
      'set-cookie': ['download_warning_1=tok=en; Path=/; HttpOnly', 'broken', 'NID=511; Domain=.google.com'],
    });

    expect(cookies).toEqual([
      { name: 'download_warning_1', value: 'tok=en' },
      { name: 'NID', value: '511' },
    ]);
    expect(cookieHeader(cookies)).toBe('download_warning_1=tok=en; NID=511');
  });

  it('accepts a single set-cookie string', () => {
    expect(parseSetCookies({ 'set-cookie': 'a=1' })).toEqual([{ name: 'a', value: '1' }]);
  });
});

describe('readText', () => {
  it('stops at the byte limit', async () => {
    const body = Readable.from([Buffer.from('abcdef'), Buffer.from('ghijkl')]);
    expect(await readText(body, 8)).toBe('abcdefgh');
    expect(body.destroyed).toBe(true);
  });
});

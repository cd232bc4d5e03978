/**
 * HTTP Transport
 * 
 * Narrow GET-only seam over undici so the download strategies can be
 * exercised against in-memory responses.
 */

import type { Readable } from 'node:stream';
import { request, type Dispatcher } from 'undici';

export type ResponseHeaders = Record<string, string | string[] | undefined>;

export interface HttpResponse {
  statusCode: number;
  headers: ResponseHeaders;
  body: Readable;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HttpTransport {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export interface UndiciTransportConfig {
  dispatcher?: Dispatcher;
  maxRedirections?: number;
  userAgent?: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export class UndiciTransport implements HttpTransport {
  private readonly dispatcher?: Dispatcher;
  private readonly maxRedirections: number;
  private readonly userAgent: string;

  constructor(config: UndiciTransportConfig = {}) {
    this.dispatcher = config.dispatcher;
    this.maxRedirections = config.maxRedirections ?? 5;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
  }

  async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const response = await request(url, {
      method: 'GET',
      headers: {
        'user-agent': this.userAgent,
        ...options.headers,
      },
      headersTimeout: options.timeoutMs,
      bodyTimeout: options.timeoutMs,
      maxRedirections: this.maxRedirections,
      dispatcher: this.dispatcher,
      signal: options.signal,
    });

    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body: response.body,
    };
  }
}

/**
 * Read a single header value (first one when repeated)
 */
export function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Parse content-length, returning undefined when absent or invalid
 */
export function contentLength(headers: ResponseHeaders): number | undefined {
  const raw = headerValue(headers, 'content-length');
  if (raw === undefined) {
    return undefined;
  }
  const length = Number.parseInt(raw, 10);
  return Number.isFinite(length) && length > 0 ? length : undefined;
}

export interface Cookie {
  name: string;
  value: string;
}

/**
 * Parse the name/value pairs out of set-cookie headers
 */
export function parseSetCookies(headers: ResponseHeaders): Cookie[] {
  const raw = headers['set-cookie'];
  const lines = raw === undefined ? [] : Array.isArray(raw) ? raw : [raw];
  const cookies: Cookie[] = [];

  for (const line of lines) {
    const pair = line.split(';')[0] ?? '';
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    cookies.push({
      name: pair.slice(0, separator).trim(),
      value: pair.slice(separator + 1).trim(),
    });
  }

  return cookies;
}

/**
 * Serialize cookies for a Cookie request header
 */
export function cookieHeader(cookies: Cookie[]): string {
  return cookies.map(cookie => `${cookie.name}=${cookie.value}`).join('; ');
}

/**
 * Read a body as text up to a byte limit, then release the stream
 */
export async function readText(body: Readable, maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  try {
    for await (const chunk of body) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      chunks.push(buffer);
      size += buffer.length;
      if (size >= maxBytes) {
        break;
      }
    }
  } finally {
    body.destroy();
  }

  return Buffer.concat(chunks).subarray(0, maxBytes).toString('utf8');
}

/**
 * Link Detector
 * 
 * Classifies source URLs and pulls Google Drive file ids out of the
 * share-link shapes Drive hands out.
 */

export type LinkType = 'gdrive' | 'http' | 'https' | 'unknown';

export interface DetectedLink {
  url: string;
  type: LinkType;
  metadata: LinkMetadata;
}

export interface LinkMetadata {
  // Google Drive info
  fileId?: string;

  // HTTP info
  domain?: string;
  path?: string;
}

const LARGE_FILE_HOSTS = ['drive.google.com', 'docs.google.com'];

// Tried in order, first match wins
const FILE_ID_PATTERNS = [
  /\/file\/d\/([a-zA-Z0-9_-]+)/,
  /id=([a-zA-Z0-9_-]+)/,
  /\/open\?id=([a-zA-Z0-9_-]+)/,
  /\/d\/([a-zA-Z0-9_-]+)/,
];

/**
 * Check if URL belongs to Google Drive
 */
export function isLargeFileHostUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return LARGE_FILE_HOSTS.some(host => lower.includes(host));
}

/**
 * Extract file ID from various Google Drive URL formats
 */
export function extractFileId(url: string): string | null {
  for (const pattern of FILE_ID_PATTERNS) {
    const match = url.match(pattern);
    if (match?.[1]) {
      return match[1];
    }
  }

  return null;
}

export class LinkDetector {
  /**
   * Detect link type and extract metadata
   */
  detect(url: string): DetectedLink | null {
    const trimmed = url.trim();

    if (!trimmed) {
      return null;
    }

    if (isLargeFileHostUrl(trimmed)) {
      const fileId = extractFileId(trimmed);
      return {
        url: trimmed,
        type: 'gdrive',
        metadata: fileId ? { fileId } : {},
      };
    }

    const lower = trimmed.toLowerCase();
    if (lower.startsWith('https://')) {
      return this.parseHttp(trimmed, 'https');
    }
    if (lower.startsWith('http://')) {
      return this.parseHttp(trimmed, 'http');
    }

    return { url: trimmed, type: 'unknown', metadata: {} };
  }

  /**
   * Parse HTTP/HTTPS link
   */
  private parseHttp(url: string, type: 'http' | 'https'): DetectedLink {
    const metadata: LinkMetadata = {};

    try {
      const parsed = new URL(url);
      metadata.domain = parsed.hostname;
      metadata.path = parsed.pathname;
    } catch {
      // Invalid URL, but still return it
    }

    return {
      url,
      type,
      metadata,
    };
  }
}

// Singleton instance
export const linkDetector = new LinkDetector();

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ensureParentDir, removeFile, safeFileSize } from './file.js';

describe('file helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'loopcast-utils-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the size of an existing file', async () => {
    const file = join(dir, 'clip.mp4');
    await writeFile(file, Buffer.alloc(1234));
    expect(await safeFileSize(file)).toBe(1234);
  });

  it('returns null for a missing file', async () => {
    expect(await safeFileSize(join(dir, 'missing.mp4'))).toBeNull();
  });

  it('creates the parent directory of a nested path', async () => {
    const file = join(dir, 'a', 'b', 'video.mp4');
    await ensureParentDir(file);
    expect(existsSync(join(dir, 'a', 'b'))).toBe(true);
  });

  it('removes files and ignores missing ones', async () => {
    const file = join(dir, 'video.mp4');
    await writeFile(file, 'x');
    await removeFile(file);
    await removeFile(file);
    expect(existsSync(file)).toBe(false);
  });
});

import { createHash } from 'node:crypto';
import { constants } from 'node:fs';
import { access, mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ContentAddressedStorage } from '../../src/storage/content-addressed.js';

function createSampleBuffer(content: string = 'photo-metadata-test'): Buffer {
  return Buffer.from(content, 'utf-8');
}

describe('ContentAddressedStorage', () => {
  let basePath: string;
  let storage: ContentAddressedStorage;

  beforeEach(async () => {
    basePath = await mkdtemp(join(tmpdir(), 'pms-storage-'));
    storage = new ContentAddressedStorage({ basePath, autoCreateDirs: true });
  });

  afterEach(async () => {
    await rm(basePath, { recursive: true, force: true });
  });

  it('stores content under its sharded hash path', async () => {
    const data = createSampleBuffer();
    const sha256 = createHash('sha256').update(data).digest('hex');

    const result = await storage.store('thumbnails', data, 'jpeg');

    expect(result.isNew).toBe(true);
    expect(result.sha256).toBe(sha256);
    expect(result.path).toBe(
      join(basePath, 'thumbnails', sha256.slice(0, 2), sha256.slice(2, 4), `${sha256}.jpeg`)
    );
    await access(result.path, constants.F_OK);
    expect((await readFile(result.path)).equals(data)).toBe(true);
  });

  it('deduplicates repeated content by hash', async () => {
    const data = createSampleBuffer('duplicate-content');

    const first = await storage.store('thumbnails', data, 'png');
    const second = await storage.store('thumbnails', data, 'png');

    expect(first.isNew).toBe(true);
    expect(second.isNew).toBe(false);
    expect(second.path).toBe(first.path);
  });

  it('keeps formats of the same content apart', async () => {
    const data = createSampleBuffer('same-bytes');

    const jpeg = await storage.store('thumbnails', data, 'jpeg');
    const webp = await storage.store('thumbnails', data, 'webp');

    expect(webp.isNew).toBe(true);
    expect(webp.sha256).toBe(jpeg.sha256);
    expect(webp.path).toBe(jpeg.path.replace(/\.jpeg$/, '.webp'));
  });

  it('computes deterministic SHA-256 hashes for data', () => {
    const data = createSampleBuffer('hash-me');
    const expected = createHash('sha256').update(data).digest('hex');

    expect(storage.computeHash(data)).toBe(expected);
    expect(storage.computeHash(data)).toBe(storage.computeHash(Buffer.from('hash-me', 'utf-8')));
  });
});

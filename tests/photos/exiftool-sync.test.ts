import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, afterEach, beforeEach, describe, expect, it } from 'vitest';

import { closeExifTool, openExifToolContainer } from '../../src/metadata/exiftool.js';
import { MemoryPhotoTagStore } from '../../src/photos/keywords.js';
import { syncRecordFromFile, syncRecordToFile } from '../../src/photos/reconciler.js';
import { createPhotoRecord } from '../helpers/photo-record.js';
import { writeTestImage } from '../helpers/test-images.js';

// exiftool runs as a child process; the first call starts it
const EXIFTOOL_TIMEOUT_MS = 30_000;

describe('reconciler with exiftool', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pms-exiftool-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  afterAll(async () => {
    await closeExifTool();
  });

  it(
    'round-trips every field through a JPEG file',
    async () => {
      const imagePath = await writeTestImage(dir, 'photo.jpg', { width: 640, height: 480 });
      const source = createPhotoRecord({
        imagePath,
        description: 'Harbour at dusk',
        artist: 'Alice Example',
        country: 'Norway',
        provinceState: 'Vestland',
        city: 'Bergen',
        location: 'Bryggen',
        timeCreated: new Date(2011, 4, 6, 7, 8, 9),
        keywords: ['harbour', 'dusk'],
        imageWidth: 640,
        imageHeight: 480
      });

      expect(await syncRecordToFile(source, { openContainer: openExifToolContainer })).toBe(true);
      expect(source.metadataSyncEnabled).toBe(true);

      const tagStore = new MemoryPhotoTagStore();
      const target = createPhotoRecord({ imagePath, imageWidth: 1, imageHeight: 1 });
      const deps = { openContainer: openExifToolContainer, tagStore };

      expect(await syncRecordFromFile(target, deps)).toBe(true);
      expect(target.metadataSyncEnabled).toBe(true);
      expect(target.description).toBe('Harbour at dusk');
      expect(target.artist).toBe('Alice Example');
      expect(target.country).toBe('Norway');
      expect(target.provinceState).toBe('Vestland');
      expect(target.city).toBe('Bergen');
      expect(target.location).toBe('Bryggen');
      expect(target.timeCreated).toEqual(new Date(2011, 4, 6, 7, 8, 9));
      expect(target.keywords).toEqual(['harbour', 'dusk']);
      expect(target.imageWidth).toBe(640);
      expect(target.imageHeight).toBe(480);

      expect(await syncRecordFromFile(target, deps)).toBe(false);
      expect(await syncRecordToFile(target, { openContainer: openExifToolContainer })).toBe(false);
    },
    EXIFTOOL_TIMEOUT_MS
  );

  it(
    'disables sync for a file that is not an image',
    async () => {
      const imagePath = join(dir, 'upload.jpg');
      await writeFile(imagePath, 'not an image at all', 'utf-8');
      const record = createPhotoRecord({ imagePath, description: 'Kept by the user' });

      expect(
        await syncRecordFromFile(record, {
          openContainer: openExifToolContainer,
          tagStore: new MemoryPhotoTagStore()
        })
      ).toBe(false);

      expect(record.metadataSyncEnabled).toBe(false);
      expect(record.description).toBe('Kept by the user');
      expect(record.saves).toBe(1);
    },
    EXIFTOOL_TIMEOUT_MS
  );

  it(
    'disables sync before writing to a file that is not an image',
    async () => {
      const imagePath = join(dir, 'notes.jpg');
      await writeFile(imagePath, 'plain notes', 'utf-8');
      const record = createPhotoRecord({ imagePath, artist: 'Alice' });

      expect(await syncRecordToFile(record, { openContainer: openExifToolContainer })).toBe(false);
      expect(record.metadataSyncEnabled).toBe(false);
      expect(record.saves).toBe(1);
    },
    EXIFTOOL_TIMEOUT_MS
  );
});

#!/usr/bin/env tsx

/**
 * Photo Metadata Inspector
 *
 * Reads a file's Exif/IPTC metadata the same way a stored photo would be
 * synced from its file, and prints the resulting field values as JSON.
 * Nothing is written to the file or the database.
 *
 * Usage:
 *   tsx scripts/inspect-photo.ts <file>
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { logger } from '../src/lib/logger.js';
import { closeExifTool, openExifToolContainer } from '../src/metadata/exiftool.js';
import { MemoryPhotoTagStore } from '../src/photos/keywords.js';
import { syncRecordFromFile } from '../src/photos/reconciler.js';
import { isJpegImage } from '../src/services/photo-metadata.js';
import type { PhotoRecord } from '../src/types/index.js';

function emptyRecord(imagePath: string, isJpeg: boolean): PhotoRecord {
  return {
    imagePath,
    isJpeg,
    metadataSyncEnabled: true,
    thumbnail: null,
    description: '',
    artist: '',
    country: '',
    provinceState: '',
    city: '',
    location: '',
    timeCreated: null,
    keywords: [],
    imageWidth: 0,
    imageHeight: 0,
    save: async () => undefined
  };
}

async function main(): Promise<void> {
  const file = process.argv[2];
  if (!file) {
    console.error('Usage: tsx scripts/inspect-photo.ts <file>');
    process.exitCode = 1;
    return;
  }

  const imagePath = resolve(file);
  const record = emptyRecord(imagePath, await isJpegImage(await readFile(imagePath)));

  try {
    await syncRecordFromFile(
      record,
      { openContainer: openExifToolContainer, tagStore: new MemoryPhotoTagStore() },
      { commit: false }
    );
  } finally {
    await closeExifTool();
  }

  if (!record.metadataSyncEnabled) {
    logger.error({ path: imagePath }, 'Metadata could not be read');
    process.exitCode = 1;
    return;
  }

  const { save: _save, ...fields } = record;
  console.log(JSON.stringify(fields, null, 2));
}

main().catch(error => {
  logger.error({ error }, 'Photo inspection failed');
  process.exitCode = 1;
});

/**
 * Photo record reconciler
 *
 * Synchronizes every mapped field of a photo record with its image file,
 * in either direction. Entry points return true when something changed.
 *
 * Read and write failures of the file trip the record's
 * `metadataSyncEnabled` circuit breaker: the flag is cleared and saved, and
 * every later call returns false without touching the file.
 */

import { logger } from '../lib/logger.js';
import {
  isMetadataAccessError,
  type ContainerOpener,
  type MetadataAccessError,
  type MetadataContainer
} from '../metadata/container.js';
import {
  datetimeSynced,
  readDatetimeFromExifAndIptc,
  syncDatetime
} from '../metadata/datetime-sync.js';
import { formatLocalDateTime, isCalendarValue, toDate } from '../metadata/local-time.js';
import {
  readExif,
  readIptc,
  readValueFromExifAndIptc,
  valueSyncedWithExif,
  valueSyncedWithExifAndIptc,
  valueSyncedWithIptc
} from '../metadata/sync-status.js';
import { syncToExif, syncToExifAndIptc, syncToIptc } from '../metadata/sync-write.js';
import type { PhotoMetadataFields, PhotoRecord, TagValue } from '../types/index.js';

import { PHOTO_FIELD_BINDINGS, type FieldBinding } from './fields.js';
import { reconcileKeywords, type PhotoTagStore } from './keywords.js';

export interface SyncToFileDependencies {
  openContainer: ContainerOpener;
}

export interface SyncFromFileDependencies extends SyncToFileDependencies {
  tagStore: PhotoTagStore;
}

export interface SyncFromFileOptions {
  /** Save the record when a field changed (default true) */
  commit?: boolean;
}

async function disableSync(record: PhotoRecord, error: MetadataAccessError): Promise<void> {
  record.metadataSyncEnabled = false;
  await record.save();
  logger.warn(
    { path: record.imagePath, operation: error.operation, error: error.message },
    'Metadata sync disabled for photo'
  );
}

/**
 * Opens the record's file, or trips the circuit breaker and returns null
 * when it cannot be read.
 */
async function openForSync(
  record: PhotoRecord,
  openContainer: ContainerOpener
): Promise<MetadataContainer | null> {
  try {
    return await openContainer(record.imagePath);
  } catch (error) {
    if (isMetadataAccessError(error)) {
      await disableSync(record, error);
      return null;
    }
    throw error;
  }
}

function writeField(binding: FieldBinding, record: PhotoRecord, container: MetadataContainer): boolean {
  switch (binding.source) {
    case 'exif-and-iptc':
      return syncToExifAndIptc(record[binding.field], container, binding.exifKey, binding.iptcKey);
    case 'iptc':
      return syncToIptc(record[binding.field], container, binding.iptcKey);
    case 'datetime':
      return syncDatetime(
        record.timeCreated,
        container,
        binding.exifKey,
        binding.iptcDateKey,
        binding.iptcTimeKey
      );
    case 'keywords':
      return syncToIptc(record.keywords, container, binding.iptcKey);
    case 'exif':
      return syncToExif(record[binding.field], container, binding.resolveKey(record.isJpeg));
  }
}

/**
 * Writes the record's field values into its image file.
 *
 * Only out-of-sync tags are touched, and the file is only rewritten when at
 * least one tag changed.
 */
export async function syncRecordToFile(
  record: PhotoRecord,
  deps: SyncToFileDependencies
): Promise<boolean> {
  if (!record.metadataSyncEnabled) {
    return false;
  }

  const container = await openForSync(record, deps.openContainer);
  if (!container) {
    return false;
  }

  try {
    let modified = false;
    for (const binding of PHOTO_FIELD_BINDINGS) {
      modified = writeField(binding, record, container) || modified;
    }

    if (modified) {
      try {
        await container.flush();
      } catch (error) {
        if (isMetadataAccessError(error)) {
          await disableSync(record, error);
          return false;
        }
        throw error;
      }
    }

    logger.debug({ path: record.imagePath, modified }, 'Photo metadata synced to file');
    return modified;
  } finally {
    await container.close();
  }
}

function asText(value: TagValue | undefined): string {
  if (value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (isCalendarValue(value)) {
    return value.kind === 'datetime' ? formatLocalDateTime(value) : '';
  }
  return value.join('; ');
}

function asList(value: TagValue | undefined): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.map(item => String(item));
  }
  return [];
}

function asInteger(value: TagValue | undefined): number | undefined {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number(value);
  }
  return undefined;
}

async function readField(
  binding: FieldBinding,
  record: PhotoRecord,
  container: MetadataContainer,
  tagStore: PhotoTagStore,
  draft: Partial<PhotoMetadataFields>
): Promise<boolean> {
  switch (binding.source) {
    case 'exif-and-iptc':
      if (valueSyncedWithExifAndIptc(record[binding.field], container, binding.exifKey, binding.iptcKey)) {
        return false;
      }
      draft[binding.field] = asText(readValueFromExifAndIptc(container, binding.exifKey, binding.iptcKey));
      return true;

    case 'iptc':
      if (valueSyncedWithIptc(record[binding.field], container, binding.iptcKey)) {
        return false;
      }
      draft[binding.field] = asText(readIptc(container, binding.iptcKey));
      return true;

    case 'datetime': {
      const { exifKey, iptcDateKey, iptcTimeKey } = binding;
      if (datetimeSynced(record.timeCreated, container, exifKey, iptcDateKey, iptcTimeKey)) {
        return false;
      }
      const value = readDatetimeFromExifAndIptc(container, exifKey, iptcDateKey, iptcTimeKey);
      draft.timeCreated = value ? toDate(value) : null;
      return true;
    }

    case 'keywords':
      if (valueSyncedWithIptc(record.keywords, container, binding.iptcKey)) {
        return false;
      }
      draft.keywords = await reconcileKeywords(tagStore, asList(readIptc(container, binding.iptcKey)));
      return true;

    case 'exif': {
      const key = binding.resolveKey(record.isJpeg);
      if (valueSyncedWithExif(record[binding.field], container, key)) {
        return false;
      }
      const value = asInteger(readExif(container, key));
      if (value !== undefined) {
        draft[binding.field] = value;
      }
      return true;
    }
  }
}

/**
 * Reads the image file's metadata into the record.
 *
 * Field updates are collected first and applied together once every field
 * has been read. Missing text tags become empty strings, a missing
 * timestamp becomes null, and missing dimensions leave the record's values
 * alone.
 */
export async function syncRecordFromFile(
  record: PhotoRecord,
  deps: SyncFromFileDependencies,
  options: SyncFromFileOptions = {}
): Promise<boolean> {
  const { commit = true } = options;

  if (!record.metadataSyncEnabled) {
    return false;
  }

  const container = await openForSync(record, deps.openContainer);
  if (!container) {
    return false;
  }

  try {
    const draft: Partial<PhotoMetadataFields> = {};
    let modified = false;
    for (const binding of PHOTO_FIELD_BINDINGS) {
      modified = (await readField(binding, record, container, deps.tagStore, draft)) || modified;
    }

    Object.assign(record, draft);

    if (modified && commit) {
      await record.save();
    }

    logger.debug(
      { path: record.imagePath, modified, fields: Object.keys(draft) },
      'Photo metadata synced from file'
    );
    return modified;
  } finally {
    await container.close();
  }
}

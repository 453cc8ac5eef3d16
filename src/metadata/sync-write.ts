/**
 * Sync writes: put a record value into the container, but only when the
 * container does not already hold it.
 *
 * Every writer returns true when it changed the container. Callers OR the
 * results together to decide whether the file needs to be flushed.
 */

import { logger } from '../lib/logger.js';
import type {
  ExifTagKey,
  FieldValue,
  IptcTagKey,
  MetadataTagKey,
  TagValue
} from '../types/index.js';

import { MetadataKeyError, type MetadataContainer } from './container.js';
import {
  hasKey,
  valueSyncedWithExif,
  valueSyncedWithExifAndIptc,
  valueSyncedWithIptc
} from './sync-status.js';
import { isAbsent, isTextSet } from './values.js';

/**
 * Deletes a key and reports nothing.
 *
 * A missing key is already the desired state. Some codecs also refuse to
 * delete certain value types and raise a type error instead; the tag is
 * treated as removed in that case too.
 */
export function deleteTolerant(container: MetadataContainer, key: MetadataTagKey): void {
  try {
    container.delete(key);
  } catch (error) {
    if (error instanceof MetadataKeyError) {
      logger.debug({ key, reason: error.reason, path: container.path }, 'Metadata key delete skipped');
      return;
    }
    throw error;
  }
}

function toTagValue(value: Exclude<FieldValue, null | undefined>): TagValue {
  return isTextSet(value) ? [...value] : value;
}

/**
 * Deletes the key when the value is empty, otherwise stores it as given
 */
function writeOrDelete(container: MetadataContainer, key: MetadataTagKey, value: FieldValue): void {
  if (value === null || value === undefined || isAbsent(value)) {
    deleteTolerant(container, key);
    return;
  }
  container.set(key, toTagValue(value));
}

export function syncToExif(value: FieldValue, container: MetadataContainer, key: ExifTagKey): boolean {
  if (valueSyncedWithExif(value, container, key)) {
    return false;
  }
  writeOrDelete(container, key, value);
  return true;
}

export function syncToIptc(value: FieldValue, container: MetadataContainer, key: IptcTagKey): boolean {
  if (valueSyncedWithIptc(value, container, key)) {
    return false;
  }
  writeOrDelete(container, key, value);
  return true;
}

/**
 * Writes a field that has both an Exif and an IPTC tag.
 *
 * Exif is the single place the value is written to. Whenever a write is
 * needed the IPTC duplicate is removed, so files converge on Exif-only
 * storage for these fields.
 */
export function syncToExifAndIptc(
  value: FieldValue,
  container: MetadataContainer,
  exifKey: ExifTagKey,
  iptcKey: IptcTagKey
): boolean {
  if (valueSyncedWithExifAndIptc(value, container, exifKey, iptcKey)) {
    return false;
  }
  writeOrDelete(container, exifKey, value);
  if (hasKey(container, iptcKey)) {
    deleteTolerant(container, iptcKey);
  }
  return true;
}

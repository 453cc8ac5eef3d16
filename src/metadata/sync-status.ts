/**
 * Sync status: is a record value already what the file holds?
 *
 * These predicates never mutate the container.
 */

import type {
  ExifTagKey,
  FieldValue,
  IptcTagKey,
  MetadataTagKey,
  TagValue
} from '../types/index.js';

import type { MetadataContainer } from './container.js';
import { isExifKey } from './keys.js';
import { normalize, semanticEquals } from './values.js';

/**
 * Value stored under an Exif key, or undefined when the file has no such tag
 */
export function readExif(container: MetadataContainer, key: ExifTagKey): TagValue | undefined {
  return container.exifKeys().includes(key) ? container.get(key) : undefined;
}

/**
 * Value stored under an IPTC key, or undefined when the file has no such tag
 */
export function readIptc(container: MetadataContainer, key: IptcTagKey): TagValue | undefined {
  return container.iptcKeys().includes(key) ? container.get(key) : undefined;
}

function syncedWith(value: FieldValue, stored: TagValue | undefined): boolean {
  return semanticEquals(normalize(value), normalize(stored));
}

export function valueSyncedWithExif(
  value: FieldValue,
  container: MetadataContainer,
  key: ExifTagKey
): boolean {
  return syncedWith(value, readExif(container, key));
}

export function valueSyncedWithIptc(
  value: FieldValue,
  container: MetadataContainer,
  key: IptcTagKey
): boolean {
  return syncedWith(value, readIptc(container, key));
}

/**
 * Checks a value against a field that has both an Exif and an IPTC tag.
 *
 * When only one of the tags holds a value, that tag decides. When both do,
 * the value must match both.
 */
export function valueSyncedWithExifAndIptc(
  value: FieldValue,
  container: MetadataContainer,
  exifKey: ExifTagKey,
  iptcKey: IptcTagKey
): boolean {
  const expected = normalize(value);
  const exifValue = normalize(readExif(container, exifKey));
  const iptcValue = normalize(readIptc(container, iptcKey));

  if (exifValue.kind === 'absent') {
    return semanticEquals(expected, iptcValue);
  }
  if (iptcValue.kind === 'absent') {
    return semanticEquals(expected, exifValue);
  }
  return semanticEquals(expected, exifValue) && semanticEquals(expected, iptcValue);
}

/**
 * Reads a field with overlapping Exif and IPTC tags. Exif wins when both are
 * set, following the Metadata Working Group guidelines.
 */
export function readValueFromExifAndIptc(
  container: MetadataContainer,
  exifKey: ExifTagKey,
  iptcKey: IptcTagKey
): TagValue | undefined {
  const exifValue = readExif(container, exifKey);
  if (normalize(exifValue).kind !== 'absent') {
    return exifValue;
  }
  return readIptc(container, iptcKey);
}

/**
 * Whether a key currently exists in its namespace
 */
export function hasKey(container: MetadataContainer, key: MetadataTagKey): boolean {
  return isExifKey(key) ? container.exifKeys().includes(key) : container.iptcKeys().includes(key);
}

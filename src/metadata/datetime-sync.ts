/**
 * Date/time reconciliation
 *
 * Exif keeps a timestamp in one combined tag; IPTC splits it into a date
 * tag and a time tag. An IPTC timestamp only counts when both parts exist.
 * Comparisons happen at whole-second resolution with no timezone.
 */

import type {
  ExifTagKey,
  IptcTagKey,
  LocalDate,
  LocalDateTime,
  LocalTime,
  TagValue
} from '../types/index.js';

import type { MetadataContainer } from './container.js';
import {
  combineDateAndTime,
  formatLocalDateTime,
  fromDate,
  isCalendarValue,
  parseExifDate,
  parseExifDateTime,
  parseExifTime,
  truncateToSeconds
} from './local-time.js';
import { hasKey, readExif, readIptc } from './sync-status.js';
import { deleteTolerant } from './sync-write.js';

export type DateTimeInput = Date | LocalDateTime | null | undefined;

function toLocalDateTime(value: DateTimeInput): LocalDateTime | null {
  if (value === null || value === undefined) {
    return null;
  }
  return truncateToSeconds(value instanceof Date ? fromDate(value) : value);
}

function asDateTime(value: TagValue | undefined): LocalDateTime | null {
  if (typeof value === 'string') {
    const parsed = parseExifDateTime(value);
    return parsed ? truncateToSeconds(parsed) : null;
  }
  if (isCalendarValue(value) && value.kind === 'datetime') {
    return truncateToSeconds(value);
  }
  return null;
}

function asDate(value: TagValue | undefined): LocalDate | null {
  if (typeof value === 'string') {
    return parseExifDate(value);
  }
  if (isCalendarValue(value) && value.kind === 'date') {
    return value;
  }
  return null;
}

function asTime(value: TagValue | undefined): LocalTime | null {
  if (typeof value === 'string') {
    return parseExifTime(value);
  }
  if (isCalendarValue(value) && value.kind === 'time') {
    return value;
  }
  return null;
}

function sameDateTime(a: LocalDateTime | null, b: LocalDateTime | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return formatLocalDateTime(a) === formatLocalDateTime(b);
}

function readIptcDateTime(
  container: MetadataContainer,
  iptcDateKey: IptcTagKey,
  iptcTimeKey: IptcTagKey
): LocalDateTime | null {
  const date = asDate(readIptc(container, iptcDateKey));
  const time = asTime(readIptc(container, iptcTimeKey));
  return date && time ? combineDateAndTime(date, time) : null;
}

export function datetimeSynced(
  value: DateTimeInput,
  container: MetadataContainer,
  exifKey: ExifTagKey,
  iptcDateKey: IptcTagKey,
  iptcTimeKey: IptcTagKey
): boolean {
  const expected = toLocalDateTime(value);
  const exifValue = asDateTime(readExif(container, exifKey));
  const iptcValue = readIptcDateTime(container, iptcDateKey, iptcTimeKey);

  if (exifValue === null) {
    return sameDateTime(expected, iptcValue);
  }
  if (iptcValue === null) {
    return sameDateTime(expected, exifValue);
  }
  return sameDateTime(expected, exifValue) && sameDateTime(expected, iptcValue);
}

/**
 * Writes a timestamp into the combined Exif tag and drops the IPTC pair.
 */
export function syncDatetime(
  value: DateTimeInput,
  container: MetadataContainer,
  exifKey: ExifTagKey,
  iptcDateKey: IptcTagKey,
  iptcTimeKey: IptcTagKey
): boolean {
  if (datetimeSynced(value, container, exifKey, iptcDateKey, iptcTimeKey)) {
    return false;
  }

  const expected = toLocalDateTime(value);
  if (expected) {
    container.set(exifKey, expected);
  } else {
    deleteTolerant(container, exifKey);
  }

  if (hasKey(container, iptcDateKey)) {
    deleteTolerant(container, iptcDateKey);
  }
  if (hasKey(container, iptcTimeKey)) {
    deleteTolerant(container, iptcTimeKey);
  }
  return true;
}

/**
 * Reads a timestamp: the Exif tag when set, otherwise the combined IPTC
 * date and time, otherwise null.
 */
export function readDatetimeFromExifAndIptc(
  container: MetadataContainer,
  exifKey: ExifTagKey,
  iptcDateKey: IptcTagKey,
  iptcTimeKey: IptcTagKey
): LocalDateTime | null {
  return (
    asDateTime(readExif(container, exifKey)) ??
    readIptcDateTime(container, iptcDateKey, iptcTimeKey)
  );
}

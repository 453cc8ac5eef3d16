/**
 * exiftool-backed metadata container
 *
 * Opens an image with exiftool, exposes the tags of the photo mapping under
 * their `Exif.*` / `Iptc.*` keys, and writes buffered changes back in a
 * single exiftool call on flush.
 *
 * exiftool reports tags by family-1 group (`IFD0`, `ExifIFD`, `IPTC`), which
 * is what separates the IFD0 image dimensions from the Exif pixel
 * dimensions and the Exif description from the IPTC caption.
 */

import { ExifDate, ExifDateTime, ExifTime, ExifTool } from 'exiftool-vendored';
import { randomBytes } from 'node:crypto';
import { rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { env } from '../config/index.js';
import { logger } from '../lib/logger.js';
import type { MetadataTagKey, TagValue } from '../types/index.js';

import {
  BufferedMetadataContainer,
  MetadataAccessError,
  type ContainerOpener,
  type PendingChange
} from './container.js';
import {
  EXIF_ARTIST,
  EXIF_DATETIME_ORIGINAL,
  EXIF_IMAGE_DESCRIPTION,
  EXIF_IMAGE_LENGTH,
  EXIF_IMAGE_WIDTH,
  EXIF_PIXEL_X_DIMENSION,
  EXIF_PIXEL_Y_DIMENSION,
  IPTC_BYLINE,
  IPTC_CAPTION,
  IPTC_CITY,
  IPTC_COUNTRY_NAME,
  IPTC_DATE_CREATED,
  IPTC_KEYWORDS,
  IPTC_PROVINCE_STATE,
  IPTC_SUB_LOCATION,
  IPTC_TIME_CREATED
} from './keys.js';
import {
  formatExifDate,
  formatExifDateTime,
  formatExifTime,
  isCalendarValue,
  localDate,
  localDateTime,
  localTime,
  parseExifDate,
  parseExifDateTime,
  parseExifTime
} from './local-time.js';

/**
 * Shape exiftool values are converted into
 */
export type TagValueType = 'text' | 'integer' | 'list' | 'datetime' | 'date' | 'time';

export interface ExifToolTagMapping {
  key: MetadataTagKey;
  /** Group-qualified exiftool tag name */
  tag: string;
  type: TagValueType;
}

export const EXIFTOOL_TAG_MAPPINGS: readonly ExifToolTagMapping[] = [
  { key: EXIF_IMAGE_DESCRIPTION, tag: 'IFD0:ImageDescription', type: 'text' },
  { key: EXIF_ARTIST, tag: 'IFD0:Artist', type: 'text' },
  { key: EXIF_DATETIME_ORIGINAL, tag: 'ExifIFD:DateTimeOriginal', type: 'datetime' },
  { key: EXIF_IMAGE_WIDTH, tag: 'IFD0:ImageWidth', type: 'integer' },
  // exiftool names the TIFF ImageLength tag ImageHeight
  { key: EXIF_IMAGE_LENGTH, tag: 'IFD0:ImageHeight', type: 'integer' },
  { key: EXIF_PIXEL_X_DIMENSION, tag: 'ExifIFD:ExifImageWidth', type: 'integer' },
  { key: EXIF_PIXEL_Y_DIMENSION, tag: 'ExifIFD:ExifImageHeight', type: 'integer' },
  { key: IPTC_CAPTION, tag: 'IPTC:Caption-Abstract', type: 'text' },
  { key: IPTC_BYLINE, tag: 'IPTC:By-line', type: 'text' },
  { key: IPTC_COUNTRY_NAME, tag: 'IPTC:Country-PrimaryLocationName', type: 'text' },
  { key: IPTC_PROVINCE_STATE, tag: 'IPTC:Province-State', type: 'text' },
  { key: IPTC_CITY, tag: 'IPTC:City', type: 'text' },
  { key: IPTC_SUB_LOCATION, tag: 'IPTC:Sub-location', type: 'text' },
  { key: IPTC_DATE_CREATED, tag: 'IPTC:DateCreated', type: 'date' },
  { key: IPTC_TIME_CREATED, tag: 'IPTC:TimeCreated', type: 'time' },
  { key: IPTC_KEYWORDS, tag: 'IPTC:Keywords', type: 'list' }
];

export const THUMBNAIL_TAG = 'IFD1:ThumbnailImage';

const MIME_TYPE_TAG = 'File:MIMEType';

const MAPPING_BY_KEY = new Map(EXIFTOOL_TAG_MAPPINGS.map(mapping => [mapping.key, mapping]));

/**
 * Singleton exiftool instance
 */
let exiftool: ExifTool | null = null;

function getExifTool(): ExifTool {
  if (!exiftool) {
    exiftool = new ExifTool({
      taskTimeoutMillis: env.EXIFTOOL_TASK_TIMEOUT_MS,
      maxProcs: env.EXIFTOOL_MAX_PROCS
    });
  }
  return exiftool;
}

/**
 * Close exiftool instance (call on shutdown)
 */
export async function closeExifTool(): Promise<void> {
  if (exiftool) {
    await exiftool.end();
    exiftool = null;
  }
}

function joinText(values: readonly unknown[]): string {
  return values.map(item => String(item)).join('; ');
}

/**
 * Converts a value reported by exiftool into the container's value model.
 * Returns undefined for values that cannot be represented.
 */
export function fromExifToolValue(type: TagValueType, raw: unknown): TagValue | undefined {
  switch (type) {
    case 'text':
      if (typeof raw === 'string') return raw;
      if (typeof raw === 'number') return String(raw);
      if (Array.isArray(raw)) return joinText(raw);
      if (raw instanceof ExifDateTime || raw instanceof ExifDate || raw instanceof ExifTime) {
        return raw.toString();
      }
      return undefined;

    case 'integer': {
      const value = typeof raw === 'string' ? Number(raw.trim()) : raw;
      return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
    }

    case 'list':
      if (Array.isArray(raw)) return raw.map(item => String(item));
      if (typeof raw === 'string' || typeof raw === 'number') return [String(raw)];
      return undefined;

    case 'datetime':
      if (raw instanceof ExifDateTime) {
        return localDateTime(raw.year, raw.month, raw.day, raw.hour, raw.minute, raw.second);
      }
      return typeof raw === 'string' ? parseExifDateTime(raw) ?? undefined : undefined;

    case 'date':
      if (raw instanceof ExifDate || raw instanceof ExifDateTime) {
        return localDate(raw.year, raw.month, raw.day);
      }
      return typeof raw === 'string' ? parseExifDate(raw) ?? undefined : undefined;

    case 'time':
      if (raw instanceof ExifTime || raw instanceof ExifDateTime) {
        return localTime(raw.hour, raw.minute, raw.second);
      }
      return typeof raw === 'string' ? parseExifTime(raw) ?? undefined : undefined;
  }
}

/**
 * Escapes a value for exiftool's `-ex` mode so that line breaks survive the
 * line-oriented argument protocol.
 */
export function escapeValue(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/\r/g, '&#xd;')
    .replace(/\n/g, '&#xa;');
}

function formatValue(value: TagValue): string {
  if (typeof value === 'string') {
    return escapeValue(value);
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (isCalendarValue(value)) {
    switch (value.kind) {
      case 'datetime':
        return formatExifDateTime(value);
      case 'date':
        return formatExifDate(value);
      case 'time':
        return formatExifTime(value);
    }
  }
  return escapeValue(joinText(value));
}

/**
 * Builds the exiftool assignment arguments for a set of pending changes.
 * A `null` change clears the tag; list values assign each item, which
 * replaces the existing list.
 */
export function toExifToolArgs(
  changes: ReadonlyMap<MetadataTagKey, PendingChange>,
  thumbnailPath: string | null = null
): string[] {
  const args: string[] = ['-overwrite_original', '-ex'];

  for (const [key, value] of changes) {
    const mapping = MAPPING_BY_KEY.get(key);
    if (!mapping) {
      throw new Error(`No exiftool tag is mapped to ${key}`);
    }

    if (value === null) {
      args.push(`-${mapping.tag}=`);
    } else if (Array.isArray(value) && mapping.type === 'list') {
      if (value.length === 0) {
        args.push(`-${mapping.tag}=`);
      }
      for (const item of value) {
        args.push(`-${mapping.tag}=${escapeValue(String(item))}`);
      }
    } else {
      args.push(`-${mapping.tag}=${formatValue(value)}`);
    }
  }

  if (thumbnailPath) {
    args.push(`-${THUMBNAIL_TAG}<=${thumbnailPath}`);
  }

  return args;
}

/**
 * Picks the mapped tags out of a group-qualified exiftool result.
 *
 * @throws {Error} when exiftool reported the file as unreadable or as
 * something other than an image
 */
export function fromExifToolTags(tags: ReadonlyMap<string, unknown>): Array<[MetadataTagKey, TagValue]> {
  for (const [name, value] of tags) {
    if ((name === 'Error' || name.endsWith(':Error')) && typeof value === 'string') {
      throw new Error(value);
    }
  }

  // exiftool reads any file; text and unknown formats come back without errors
  const mimeType = tags.get(MIME_TYPE_TAG);
  if (typeof mimeType !== 'string' || !mimeType.startsWith('image/')) {
    throw new Error(`Not an image file (${typeof mimeType === 'string' ? mimeType : 'unknown type'})`);
  }

  const entries: Array<[MetadataTagKey, TagValue]> = [];
  for (const mapping of EXIFTOOL_TAG_MAPPINGS) {
    const raw = tags.get(mapping.tag);
    if (raw === undefined || raw === null) {
      continue;
    }
    const value = fromExifToolValue(mapping.type, raw);
    if (value !== undefined) {
      entries.push([mapping.key, value]);
    }
  }
  return entries;
}

export class ExifToolContainer extends BufferedMetadataContainer {
  constructor(
    path: string,
    initial: Iterable<[MetadataTagKey, TagValue]>,
    private readonly hasEmbeddedThumbnail: boolean
  ) {
    super(path, initial);
  }

  async thumbnail(): Promise<Buffer | null> {
    if (this.pendingThumbnail) {
      return this.pendingThumbnail;
    }
    if (!this.hasEmbeddedThumbnail) {
      return null;
    }
    try {
      return await getExifTool().extractBinaryTagToBuffer('ThumbnailImage', this.path);
    } catch (error) {
      throw new MetadataAccessError('read', this.path, { cause: error });
    }
  }

  protected async write(
    changes: ReadonlyMap<MetadataTagKey, PendingChange>,
    thumbnail: Buffer | null
  ): Promise<void> {
    const thumbnailPath = thumbnail
      ? join(tmpdir(), `thumb-embed-${randomBytes(8).toString('hex')}.jpg`)
      : null;
    const args = toExifToolArgs(changes, thumbnailPath);

    try {
      if (thumbnail && thumbnailPath) {
        await writeFile(thumbnailPath, thumbnail);
      }
      await getExifTool().write(this.path, {}, args);
      logger.debug({ path: this.path, changes: changes.size }, 'Metadata written');
    } catch (error) {
      throw new MetadataAccessError('write', this.path, { cause: error });
    } finally {
      if (thumbnailPath) {
        await rm(thumbnailPath, { force: true });
      }
    }
  }
}

/**
 * Opens a file's metadata with exiftool
 */
export const openExifToolContainer: ContainerOpener = async (path: string) => {
  let tags: Map<string, unknown>;
  let entries: Array<[MetadataTagKey, TagValue]>;
  try {
    const result = await getExifTool().read(path, ['-G1']);
    const raw: Array<[string, unknown]> = Object.entries(result);
    tags = new Map(raw);
    entries = fromExifToolTags(tags);
  } catch (error) {
    throw new MetadataAccessError('read', path, { cause: error });
  }

  logger.debug({ path, tags: entries.length }, 'Metadata read');
  return new ExifToolContainer(path, entries, tags.has(THUMBNAIL_TAG));
};

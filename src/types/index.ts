// Core type definitions for the photo metadata sync service

/**
 * Key of a single metadata tag, e.g. `Exif.Image.Artist` or
 * `Iptc.Application2.Keywords`. The prefix is the namespace.
 */
export type ExifTagKey = `Exif.${string}`;
export type IptcTagKey = `Iptc.${string}`;
export type MetadataTagKey = ExifTagKey | IptcTagKey;

export type MetadataNamespace = 'exif' | 'iptc';

/**
 * Calendar date and wall-clock time with no timezone attached.
 */
export interface LocalDateTime {
  kind: 'datetime';
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

export interface LocalDate {
  kind: 'date';
  year: number;
  month: number;
  day: number;
}

export interface LocalTime {
  kind: 'time';
  hour: number;
  minute: number;
  second: number;
}

/**
 * A value as stored under one key of a metadata container.
 */
export type TagValue =
  | string
  | number
  | readonly string[]
  | LocalDateTime
  | LocalDate
  | LocalTime;

/**
 * A value handed to the sync engines by the record side.
 * `null`/`undefined` mean "no value".
 */
export type FieldValue = TagValue | ReadonlySet<string> | null | undefined;

/**
 * Canonical form used for every equality check.
 */
export type SemanticValue =
  | { kind: 'absent' }
  | { kind: 'text'; value: string }
  | { kind: 'integer'; value: number }
  | { kind: 'datetime'; value: LocalDateTime }
  | { kind: 'date'; value: LocalDate }
  | { kind: 'time'; value: LocalTime }
  | { kind: 'text-set'; values: ReadonlySet<string> };

/**
 * Reference to a stored thumbnail asset
 */
export interface ThumbnailRef {
  sha256: string;
  path: string;
  format: string;
  width: number;
  height: number;
}

/**
 * Fields of a photo that are mirrored into the image file's metadata
 */
export interface PhotoMetadataFields {
  description: string;
  artist: string;
  country: string;
  provinceState: string;
  city: string;
  location: string;
  timeCreated: Date | null;
  keywords: string[];
  imageWidth: number;
  imageHeight: number;
}

/**
 * A photo as seen by the reconciler. Persistence is owned by the caller;
 * `save()` writes the current field values back.
 */
export interface PhotoRecord extends PhotoMetadataFields {
  readonly imagePath: string;
  readonly isJpeg: boolean;
  metadataSyncEnabled: boolean;
  thumbnail: ThumbnailRef | null;
  save(): Promise<unknown>;
}

/**
 * Keyword entity with case-insensitive identity
 */
export interface PhotoTag {
  name: string;
}

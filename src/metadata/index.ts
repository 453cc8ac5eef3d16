/**
 * Metadata module - Exif/IPTC tag access and reconciliation primitives
 *
 * - Tag keys and the semantic value model
 * - Buffered metadata containers (exiftool-backed)
 * - Sync status checks and tolerant writes
 * - Date/time split across Exif and IPTC
 */

export * from './keys.js';
export * from './local-time.js';
export * from './values.js';

export {
  BufferedMetadataContainer,
  MetadataAccessError,
  MetadataKeyError,
  isMetadataAccessError,
  type ContainerOpener,
  type MetadataContainer,
  type MetadataKeyErrorReason,
  type MetadataOperation,
  type PendingChange
} from './container.js';

export {
  hasKey,
  readExif,
  readIptc,
  readValueFromExifAndIptc,
  valueSyncedWithExif,
  valueSyncedWithExifAndIptc,
  valueSyncedWithIptc
} from './sync-status.js';

export { deleteTolerant, syncToExif, syncToExifAndIptc, syncToIptc } from './sync-write.js';

export {
  datetimeSynced,
  readDatetimeFromExifAndIptc,
  syncDatetime,
  type DateTimeInput
} from './datetime-sync.js';

export {
  EXIFTOOL_TAG_MAPPINGS,
  ExifToolContainer,
  closeExifTool,
  openExifToolContainer,
  type ExifToolTagMapping,
  type TagValueType
} from './exiftool.js';

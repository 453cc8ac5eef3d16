/**
 * Mapping between photo record fields and metadata tags, in the order the
 * reconciler processes them.
 */

import {
  EXIF_ARTIST,
  EXIF_DATETIME_ORIGINAL,
  EXIF_IMAGE_DESCRIPTION,
  IPTC_BYLINE,
  IPTC_CAPTION,
  IPTC_CITY,
  IPTC_COUNTRY_NAME,
  IPTC_DATE_CREATED,
  IPTC_KEYWORDS,
  IPTC_PROVINCE_STATE,
  IPTC_SUB_LOCATION,
  IPTC_TIME_CREATED,
  heightKey,
  widthKey
} from '../metadata/keys.js';
import type { ExifTagKey, IptcTagKey } from '../types/index.js';

export type TextField = 'description' | 'artist' | 'country' | 'provinceState' | 'city' | 'location';
export type DimensionField = 'imageWidth' | 'imageHeight';

export type FieldBinding =
  | { field: TextField; source: 'exif-and-iptc'; exifKey: ExifTagKey; iptcKey: IptcTagKey }
  | { field: TextField; source: 'iptc'; iptcKey: IptcTagKey }
  | {
      field: 'timeCreated';
      source: 'datetime';
      exifKey: ExifTagKey;
      iptcDateKey: IptcTagKey;
      iptcTimeKey: IptcTagKey;
    }
  | { field: 'keywords'; source: 'keywords'; iptcKey: IptcTagKey }
  | { field: DimensionField; source: 'exif'; resolveKey: (isJpeg: boolean) => ExifTagKey };

export const PHOTO_FIELD_BINDINGS: readonly FieldBinding[] = [
  {
    field: 'description',
    source: 'exif-and-iptc',
    exifKey: EXIF_IMAGE_DESCRIPTION,
    iptcKey: IPTC_CAPTION
  },
  { field: 'artist', source: 'exif-and-iptc', exifKey: EXIF_ARTIST, iptcKey: IPTC_BYLINE },
  { field: 'country', source: 'iptc', iptcKey: IPTC_COUNTRY_NAME },
  { field: 'provinceState', source: 'iptc', iptcKey: IPTC_PROVINCE_STATE },
  { field: 'city', source: 'iptc', iptcKey: IPTC_CITY },
  { field: 'location', source: 'iptc', iptcKey: IPTC_SUB_LOCATION },
  {
    field: 'timeCreated',
    source: 'datetime',
    exifKey: EXIF_DATETIME_ORIGINAL,
    iptcDateKey: IPTC_DATE_CREATED,
    iptcTimeKey: IPTC_TIME_CREATED
  },
  { field: 'keywords', source: 'keywords', iptcKey: IPTC_KEYWORDS },
  { field: 'imageWidth', source: 'exif', resolveKey: widthKey },
  { field: 'imageHeight', source: 'exif', resolveKey: heightKey }
];

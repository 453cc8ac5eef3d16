/**
 * Metadata tag keys used by the photo record mapping.
 *
 * Keys follow the `<Namespace>.<Group>.<Name>` convention shared by most
 * Exif/IPTC tooling, so values written here are readable by other tools.
 */

import type { ExifTagKey, IptcTagKey, MetadataNamespace, MetadataTagKey } from '../types/index.js';

export const EXIF_IMAGE_DESCRIPTION = 'Exif.Image.ImageDescription' satisfies ExifTagKey;
export const EXIF_ARTIST = 'Exif.Image.Artist' satisfies ExifTagKey;
export const EXIF_DATETIME_ORIGINAL = 'Exif.Photo.DateTimeOriginal' satisfies ExifTagKey;
export const EXIF_IMAGE_WIDTH = 'Exif.Image.ImageWidth' satisfies ExifTagKey;
export const EXIF_IMAGE_LENGTH = 'Exif.Image.ImageLength' satisfies ExifTagKey;
export const EXIF_PIXEL_X_DIMENSION = 'Exif.Photo.PixelXDimension' satisfies ExifTagKey;
export const EXIF_PIXEL_Y_DIMENSION = 'Exif.Photo.PixelYDimension' satisfies ExifTagKey;

export const IPTC_CAPTION = 'Iptc.Application2.Caption' satisfies IptcTagKey;
export const IPTC_BYLINE = 'Iptc.Application2.Byline' satisfies IptcTagKey;
export const IPTC_COUNTRY_NAME = 'Iptc.Application2.CountryName' satisfies IptcTagKey;
export const IPTC_PROVINCE_STATE = 'Iptc.Application2.ProvinceState' satisfies IptcTagKey;
export const IPTC_CITY = 'Iptc.Application2.City' satisfies IptcTagKey;
export const IPTC_SUB_LOCATION = 'Iptc.Application2.SubLocation' satisfies IptcTagKey;
export const IPTC_DATE_CREATED = 'Iptc.Application2.DateCreated' satisfies IptcTagKey;
export const IPTC_TIME_CREATED = 'Iptc.Application2.TimeCreated' satisfies IptcTagKey;
export const IPTC_KEYWORDS = 'Iptc.Application2.Keywords' satisfies IptcTagKey;

/**
 * Exif key holding the image width. JPEG files keep their pixel
 * dimensions in the Exif sub-IFD rather than in IFD0.
 */
export function widthKey(isJpeg: boolean): ExifTagKey {
  return isJpeg ? EXIF_PIXEL_X_DIMENSION : EXIF_IMAGE_WIDTH;
}

/**
 * Exif key holding the image height (see {@link widthKey}).
 */
export function heightKey(isJpeg: boolean): ExifTagKey {
  return isJpeg ? EXIF_PIXEL_Y_DIMENSION : EXIF_IMAGE_LENGTH;
}

export function isExifKey(key: MetadataTagKey): key is ExifTagKey {
  return key.startsWith('Exif.');
}

export function namespaceOf(key: MetadataTagKey): MetadataNamespace {
  return isExifKey(key) ? 'exif' : 'iptc';
}

import { describe, expect, it } from 'vitest';

import {
  EXIF_IMAGE_LENGTH,
  EXIF_IMAGE_WIDTH,
  EXIF_PIXEL_X_DIMENSION,
  EXIF_PIXEL_Y_DIMENSION,
  IPTC_KEYWORDS,
  heightKey,
  isExifKey,
  namespaceOf,
  widthKey
} from '../../src/metadata/keys.js';

describe('metadata keys', () => {
  it('reads JPEG dimensions from the Exif sub-IFD', () => {
    expect(widthKey(true)).toBe(EXIF_PIXEL_X_DIMENSION);
    expect(heightKey(true)).toBe(EXIF_PIXEL_Y_DIMENSION);
  });

  it('reads other formats from IFD0', () => {
    expect(widthKey(false)).toBe(EXIF_IMAGE_WIDTH);
    expect(heightKey(false)).toBe(EXIF_IMAGE_LENGTH);
  });

  it('derives the namespace from the key prefix', () => {
    expect(isExifKey('Exif.Image.Artist')).toBe(true);
    expect(isExifKey(IPTC_KEYWORDS)).toBe(false);
    expect(namespaceOf('Exif.Photo.DateTimeOriginal')).toBe('exif');
    expect(namespaceOf('Iptc.Application2.City')).toBe('iptc');
  });
});

import { describe, expect, it } from 'vitest';

import {
  hasKey,
  readExif,
  readIptc,
  readValueFromExifAndIptc,
  valueSyncedWithExif,
  valueSyncedWithExifAndIptc,
  valueSyncedWithIptc
} from '../../src/metadata/sync-status.js';
import { MemoryContainer } from '../helpers/memory-container.js';

const EXIF = 'Exif.Image.ImageDescription';
const IPTC = 'Iptc.Application2.Caption';

describe('sync status', () => {
  it('reads only existing keys', () => {
    const container = new MemoryContainer('/a.jpg', { [EXIF]: 'Sunset' });

    expect(readExif(container, EXIF)).toBe('Sunset');
    expect(readIptc(container, IPTC)).toBeUndefined();
    expect(hasKey(container, EXIF)).toBe(true);
    expect(hasKey(container, IPTC)).toBe(false);
  });

  it('treats an empty value as synced with a missing tag', () => {
    const container = new MemoryContainer('/a.jpg');

    expect(valueSyncedWithExif('', container, EXIF)).toBe(true);
    expect(valueSyncedWithIptc([], container, 'Iptc.Application2.Keywords')).toBe(true);
    expect(valueSyncedWithExif('Sunset', container, EXIF)).toBe(false);
  });

  it('compares keyword lists without order', () => {
    const container = new MemoryContainer('/a.jpg', {
      'Iptc.Application2.Keywords': ['sunset', 'beach']
    });

    expect(valueSyncedWithIptc(['beach', 'sunset'], container, 'Iptc.Application2.Keywords')).toBe(
      true
    );
    expect(valueSyncedWithIptc(['beach'], container, 'Iptc.Application2.Keywords')).toBe(false);
  });

  describe('fields stored in both Exif and IPTC', () => {
    it('uses IPTC when Exif is empty', () => {
      const container = new MemoryContainer('/a.jpg', { [IPTC]: 'Sunset' });

      expect(valueSyncedWithExifAndIptc('Sunset', container, EXIF, IPTC)).toBe(true);
      expect(valueSyncedWithExifAndIptc('Dawn', container, EXIF, IPTC)).toBe(false);
    });

    it('uses Exif when IPTC is empty', () => {
      const container = new MemoryContainer('/a.jpg', { [EXIF]: 'Sunset', [IPTC]: '' });

      expect(valueSyncedWithExifAndIptc('Sunset', container, EXIF, IPTC)).toBe(true);
    });

    it('requires both to match when both are set', () => {
      const container = new MemoryContainer('/a.jpg', { [EXIF]: 'Sunset', [IPTC]: 'Dawn' });

      expect(valueSyncedWithExifAndIptc('Sunset', container, EXIF, IPTC)).toBe(false);
      expect(valueSyncedWithExifAndIptc('Dawn', container, EXIF, IPTC)).toBe(false);
    });

    it('treats an absent value as synced only with absent tags', () => {
      expect(valueSyncedWithExifAndIptc('', new MemoryContainer('/a.jpg'), EXIF, IPTC)).toBe(true);
      expect(
        valueSyncedWithExifAndIptc('', new MemoryContainer('/a.jpg', { [IPTC]: 'x' }), EXIF, IPTC)
      ).toBe(false);
    });

    it('reads Exif first', () => {
      const both = new MemoryContainer('/a.jpg', { [EXIF]: 'From Exif', [IPTC]: 'From IPTC' });
      const iptcOnly = new MemoryContainer('/a.jpg', { [EXIF]: '', [IPTC]: 'From IPTC' });
      const neither = new MemoryContainer('/a.jpg');

      expect(readValueFromExifAndIptc(both, EXIF, IPTC)).toBe('From Exif');
      expect(readValueFromExifAndIptc(iptcOnly, EXIF, IPTC)).toBe('From IPTC');
      expect(readValueFromExifAndIptc(neither, EXIF, IPTC)).toBeUndefined();
    });
  });
});

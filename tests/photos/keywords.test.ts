import { describe, expect, it } from 'vitest';

import {
  MemoryPhotoTagStore,
  getOrCreateTag,
  reconcileKeywords
} from '../../src/photos/keywords.js';

describe('photo tags', () => {
  it('reuses a tag that matches case-insensitively', async () => {
    const store = new MemoryPhotoTagStore(['Beach']);

    const tag = await getOrCreateTag(store, 'beach');

    expect(tag.name).toBe('Beach');
    expect(store.size).toBe(1);
  });

  it('creates missing tags', async () => {
    const store = new MemoryPhotoTagStore();

    const tag = await getOrCreateTag(store, 'Sunset');

    expect(tag.name).toBe('Sunset');
    expect(store.names()).toEqual(['Sunset']);
  });
});

describe('reconcileKeywords', () => {
  it('resolves names against stored tags in input order', async () => {
    const store = new MemoryPhotoTagStore(['Beach']);

    const names = await reconcileKeywords(store, ['sunset', 'BEACH']);

    expect(names).toEqual(['sunset', 'Beach']);
    expect(store.names()).toEqual(['Beach', 'sunset']);
  });

  it('drops blanks and case-insensitive duplicates', async () => {
    const store = new MemoryPhotoTagStore();

    const names = await reconcileKeywords(store, [' Beach ', '', '   ', 'beach', 'x'.repeat(65)]);

    expect(names).toEqual(['Beach']);
    expect(store.size).toBe(1);
  });
});

/**
 * Keyword (photo tag) reconciliation
 *
 * Keywords have case-insensitive identity: "Beach" and "beach" are the same
 * tag. Assigning keywords to a photo looks each name up by case-insensitive
 * match and creates the tag only when none exists.
 */

import { logger } from '../lib/logger.js';
import { KeywordNameSchema } from '../lib/validation.js';
import type { PhotoTag } from '../types/index.js';

/**
 * Storage of keyword tags
 */
export interface PhotoTagStore {
  /** Tag whose name matches case-insensitively, or null */
  findByName(name: string): Promise<PhotoTag | null>;
  create(name: string): Promise<PhotoTag>;
}

/**
 * Returns the stored tag for a name, creating it when missing
 */
export async function getOrCreateTag(store: PhotoTagStore, name: string): Promise<PhotoTag> {
  const existing = await store.findByName(name);
  if (existing) {
    return existing;
  }
  const created = await store.create(name);
  logger.debug({ tag: created.name }, 'Photo tag created');
  return created;
}

/**
 * Resolves keyword names against the tag store.
 *
 * Names are trimmed; blanks, invalid names and case-insensitive duplicates
 * are dropped. The result holds the stored tag names in input order.
 */
export async function reconcileKeywords(
  store: PhotoTagStore,
  names: Iterable<string>
): Promise<string[]> {
  const seen = new Set<string>();
  const resolved: string[] = [];

  for (const rawName of names) {
    const parsed = KeywordNameSchema.safeParse(rawName);
    if (!parsed.success) {
      logger.warn({ keyword: rawName, issues: parsed.error.issues }, 'Skipping invalid keyword');
      continue;
    }
    const identity = parsed.data.toLowerCase();
    if (seen.has(identity)) {
      continue;
    }
    seen.add(identity);

    const tag = await getOrCreateTag(store, parsed.data);
    resolved.push(tag.name);
  }

  return resolved;
}

/**
 * In-process tag store
 */
export class MemoryPhotoTagStore implements PhotoTagStore {
  private readonly tags = new Map<string, PhotoTag>();

  constructor(initial: Iterable<string> = []) {
    for (const name of initial) {
      this.tags.set(name.toLowerCase(), { name });
    }
  }

  async findByName(name: string): Promise<PhotoTag | null> {
    return this.tags.get(name.toLowerCase()) ?? null;
  }

  async create(name: string): Promise<PhotoTag> {
    const tag: PhotoTag = { name };
    this.tags.set(name.toLowerCase(), tag);
    return tag;
  }

  get size(): number {
    return this.tags.size;
  }

  names(): string[] {
    return [...this.tags.values()].map(tag => tag.name);
  }
}

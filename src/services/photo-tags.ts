import { logger } from '../lib/logger.js';
import { PHOTO_TAG_COLLATION, PhotoTagModel } from '../models/index.js';
import type { PhotoTagStore } from '../photos/keywords.js';
import type { PhotoTag } from '../types/index.js';

/**
 * Photo tag store backed by the PhotoTag collection
 *
 * Lookups use the collection's case-insensitive collation, so they hit the
 * unique name index.
 */
export class MongoPhotoTagStore implements PhotoTagStore {
  async findByName(name: string): Promise<PhotoTag | null> {
    const tag = await PhotoTagModel.findOne({ name }).collation(PHOTO_TAG_COLLATION).lean();
    return tag ? { name: tag.name } : null;
  }

  async create(name: string): Promise<PhotoTag> {
    const tag = await PhotoTagModel.create({ name });
    logger.info({ tag: tag.name }, 'Stored new photo tag');
    return { name: tag.name };
  }
}

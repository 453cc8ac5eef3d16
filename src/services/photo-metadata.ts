import sharp from 'sharp';

import { logger } from '../lib/logger.js';
import { PhotoIdSchema } from '../lib/validation.js';
import type { ContainerOpener } from '../metadata/container.js';
import { openExifToolContainer } from '../metadata/exiftool.js';
import { PhotoModel } from '../models/index.js';
import type { PhotoTagStore } from '../photos/keywords.js';
import {
  syncRecordFromFile,
  syncRecordToFile,
  type SyncFromFileOptions
} from '../photos/reconciler.js';
import type { AssetStore } from '../storage/content-addressed.js';
import { createThumbnail } from '../thumbnails/thumbnail.js';
import type { PhotoRecord, ThumbnailRef } from '../types/index.js';

/**
 * Photo Metadata Service
 * Binds the reconciler and thumbnail generator to their stores and to the
 * exiftool-backed metadata container
 */

export interface PhotoMetadataServiceOptions {
  tagStore: PhotoTagStore;
  assetStore: AssetStore;
  openContainer?: ContainerOpener;
  /** Total pixel count of synthesized thumbnails */
  thumbnailPixelBudget?: number;
}

export type SyncDirection = 'to-file' | 'from-file';

export interface PhotoMetadataService {
  syncRecordToFile(record: PhotoRecord): Promise<boolean>;
  syncRecordFromFile(record: PhotoRecord, options?: SyncFromFileOptions): Promise<boolean>;
  createThumbnail(record: PhotoRecord): Promise<ThumbnailRef>;
  /** Loads a stored photo by id and syncs it; false when sync is disabled or nothing changed */
  syncPhotoById(photoId: string, direction: SyncDirection): Promise<boolean>;
}

/**
 * Whether the bytes hold a JPEG image
 */
export async function isJpegImage(data: Buffer): Promise<boolean> {
  try {
    const metadata = await sharp(data).metadata();
    return metadata.format === 'jpeg';
  } catch (error) {
    logger.debug({ error }, 'Image format could not be determined');
    return false;
  }
}

export function createPhotoMetadataService(options: PhotoMetadataServiceOptions): PhotoMetadataService {
  const { tagStore, assetStore, openContainer = openExifToolContainer } = options;

  const service: PhotoMetadataService = {
    syncRecordToFile: record => syncRecordToFile(record, { openContainer }),

    syncRecordFromFile: (record, syncOptions) =>
      syncRecordFromFile(record, { openContainer, tagStore }, syncOptions),

    createThumbnail: record =>
      createThumbnail(record, {
        openContainer,
        assetStore,
        pixelBudget: options.thumbnailPixelBudget
      }),

    async syncPhotoById(photoId, direction) {
      const id = PhotoIdSchema.parse(photoId);
      const photo = await PhotoModel.findOne({ photoId: id });
      if (!photo) {
        throw new Error(`Photo not found: ${id}`);
      }

      logger.info({ photoId: id, direction }, 'Syncing photo metadata');
      return direction === 'to-file'
        ? service.syncRecordToFile(photo)
        : service.syncRecordFromFile(photo);
    }
  };

  return service;
}

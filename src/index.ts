import { env } from './config/index.js';
import {
  connectDatabase,
  disconnectDatabase,
  initializeModels,
  validateModels,
  checkDatabaseHealth
} from './database/index.js';
import { logger } from './lib/logger.js';
import { closeExifTool } from './metadata/exiftool.js';

export { createPhotoMetadataService, isJpegImage } from './services/photo-metadata.js';
export type {
  PhotoMetadataService,
  PhotoMetadataServiceOptions,
  SyncDirection
} from './services/photo-metadata.js';
export { MongoPhotoTagStore } from './services/photo-tags.js';
export { syncRecordFromFile, syncRecordToFile } from './photos/reconciler.js';
export { MemoryPhotoTagStore, reconcileKeywords, type PhotoTagStore } from './photos/keywords.js';
export { computeThumbnailSize, createThumbnail } from './thumbnails/thumbnail.js';
export { ContentAddressedStorage } from './storage/index.js';
export { PhotoModel, PhotoTagModel } from './models/index.js';
export * from './metadata/index.js';
export type * from './types/index.js';

export async function bootstrap(): Promise<void> {
  logger.info({ env: env.NODE_ENV }, 'Bootstrapping photo metadata service');

  try {
    await connectDatabase();
    logger.info('MongoDB connection established');

    const isHealthy = await checkDatabaseHealth();
    if (!isHealthy) {
      throw new Error('Database health check failed');
    }

    await initializeModels();
    logger.info('Database models initialized');

    const isValid = await validateModels();
    if (!isValid) {
      throw new Error('Model validation failed');
    }

    logger.info('Photo metadata service bootstrap completed successfully');
  } catch (error) {
    logger.error({ error }, 'Bootstrap failed');
    throw error;
  }
}

/**
 * Stops the exiftool child process and closes the database connection
 */
export async function shutdown(): Promise<void> {
  await closeExifTool();
  await disconnectDatabase();
  logger.info('Photo metadata service stopped');
}

if (import.meta.url === `file://${process.argv[1]}`) {
  bootstrap().catch(error => {
    logger.error(error, 'Fatal error during bootstrap');
    process.exitCode = 1;
  });
}

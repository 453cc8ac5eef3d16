import { connectDatabase } from './connection.js';
import { logger } from '../lib/logger.js';
import { PhotoModel, PhotoTagModel } from '../models/index.js';

/**
 * Initialize all database models and create indexes
 */
export async function initializeModels(): Promise<void> {
  logger.info('Initializing database models and indexes...');

  try {
    await connectDatabase();

    await Promise.all([PhotoModel.createIndexes(), PhotoTagModel.createIndexes()]);

    logger.info('Database models and indexes initialized successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize database models');
    throw error;
  }
}

/**
 * Validate model schemas against sample documents
 */
export async function validateModels(): Promise<boolean> {
  logger.info('Validating database models...');

  const validationTests: Array<{ model: string; run: () => Promise<void> }> = [
    {
      model: 'Photo',
      run: () =>
        new PhotoModel({
          imagePath: '/photos/sample.jpg',
          isJpeg: true,
          imageWidth: 640,
          imageHeight: 480,
          keywords: ['sample']
        }).validate()
    },
    {
      model: 'PhotoTag',
      run: () => new PhotoTagModel({ name: 'sample' }).validate()
    }
  ];

  const results = await Promise.allSettled(validationTests.map(test => test.run()));

  const failedModels = results.flatMap((result, index) =>
    result.status === 'rejected' ? [validationTests[index]?.model] : []
  );
  if (failedModels.length > 0) {
    logger.error({ failedModels }, 'Model validation failed');
    return false;
  }

  logger.info('All database models validated successfully');
  return true;
}

// Export models for convenience
export { PhotoModel, PhotoTagModel } from '../models/index.js';

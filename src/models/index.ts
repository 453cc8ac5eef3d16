// Export all models for easy importing
export { PhotoModel, type IPhoto } from './Photo.js';
export { PhotoTagModel, PHOTO_TAG_COLLATION, type IPhotoTag } from './PhotoTag.js';

// Re-export types for convenience
export type * from '../types/index.js';

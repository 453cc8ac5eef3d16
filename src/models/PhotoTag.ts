import { Schema, model, type Document } from 'mongoose';

import { validateKeywordName } from '../lib/validation.js';

export interface IPhotoTag extends Document {
  name: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Case-insensitive comparison for tag names
 */
export const PHOTO_TAG_COLLATION = { locale: 'en', strength: 2 } as const;

const PhotoTagSchema = new Schema<IPhotoTag>(
  {
    name: {
      type: String,
      required: true,
      trim: true,
      maxlength: 64,
      validate: {
        validator: validateKeywordName,
        message: 'Tag name must be 1-64 characters'
      }
    }
  },
  {
    timestamps: true,
    collection: 'phototags'
  }
);

// "Beach" and "beach" are the same tag
PhotoTagSchema.index({ name: 1 }, { unique: true, collation: PHOTO_TAG_COLLATION });

export const PhotoTagModel = model<IPhotoTag>('PhotoTag', PhotoTagSchema);

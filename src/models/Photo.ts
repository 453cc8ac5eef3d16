import { Schema, model, type Document } from 'mongoose';
import { ulid } from 'ulid';

import { validatePhotoId } from '../lib/validation.js';
import type { ThumbnailRef } from '../types/index.js';

export interface IPhoto extends Document {
  photoId: string;
  imagePath: string;
  isJpeg: boolean;

  // Fields mirrored into the image file's Exif/IPTC metadata
  description: string;
  artist: string;
  country: string;
  provinceState: string;
  city: string;
  location: string;
  timeCreated: Date | null;
  keywords: string[];
  imageWidth: number;
  imageHeight: number;

  // Cleared for good once the file's metadata fails to read or write
  metadataSyncEnabled: boolean;
  thumbnail: ThumbnailRef | null;

  createdAt: Date;
  updatedAt: Date;
}

const ThumbnailSchema = new Schema<ThumbnailRef>(
  {
    sha256: { type: String, required: true },
    path: { type: String, required: true },
    format: { type: String, required: true },
    width: { type: Number, required: true, min: 1 },
    height: { type: Number, required: true, min: 1 }
  },
  { _id: false }
);

const PhotoSchema = new Schema<IPhoto>(
  {
    photoId: {
      type: String,
      required: true,
      unique: true,
      default: () => ulid(),
      validate: {
        validator: validatePhotoId,
        message: 'photoId must be a ULID'
      }
    },
    imagePath: {
      type: String,
      required: true
    },
    isJpeg: {
      type: Boolean,
      default: false
    },
    // No length limits: values read from a file are stored as the file holds them
    description: { type: String, default: '' },
    artist: { type: String, default: '' },
    country: { type: String, default: '' },
    provinceState: { type: String, default: '' },
    city: { type: String, default: '' },
    location: { type: String, default: '' },
    timeCreated: {
      type: Date,
      default: null
    },
    keywords: {
      type: [String],
      default: []
    },
    imageWidth: {
      type: Number,
      required: true,
      min: 0
    },
    imageHeight: {
      type: Number,
      required: true,
      min: 0
    },
    metadataSyncEnabled: {
      type: Boolean,
      default: true,
      index: true
    },
    thumbnail: {
      type: ThumbnailSchema,
      default: null
    }
  },
  {
    timestamps: true,
    collection: 'photos'
  }
);

PhotoSchema.index({ keywords: 1 });

export const PhotoModel = model<IPhoto>('Photo', PhotoSchema);

import { z } from 'zod';

/**
 * Validation schemas for photo data
 */

export const KeywordNameSchema = z
  .string()
  .trim()
  .min(1, 'Keyword must not be blank')
  .max(64, 'Keyword must be at most 64 characters');

export const UlidSchema = z.string().length(26, 'ULID must be 26 characters');

export const PhotoIdSchema = UlidSchema;

export function validatePhotoId(id: string): boolean {
  return PhotoIdSchema.safeParse(id).success;
}

export function validateKeywordName(name: string): boolean {
  return KeywordNameSchema.safeParse(name).success;
}

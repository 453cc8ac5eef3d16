/**
 * Thumbnail generation
 *
 * JPEG files often carry a camera-made preview in their Exif data; that
 * preview is used as-is when present. Otherwise a thumbnail is synthesized
 * from the full image with a fixed total pixel budget, and for JPEGs the
 * result is embedded back into the file so the next run can reuse it.
 *
 * Errors are not caught here. Callers check `metadataSyncEnabled` first.
 */

import { readFile } from 'node:fs/promises';
import sharp from 'sharp';

import { thumbnailPixelBudget } from '../config/index.js';
import { logger } from '../lib/logger.js';
import type { ContainerOpener, MetadataContainer } from '../metadata/container.js';
import type { AssetStore } from '../storage/content-addressed.js';
import type { PhotoRecord, ThumbnailRef } from '../types/index.js';

export interface ThumbnailDependencies {
  openContainer: ContainerOpener;
  assetStore: AssetStore;
  /** Total pixel count of synthesized thumbnails (defaults to THUMBNAIL_PIXEL_BUDGET) */
  pixelBudget?: number;
}

export interface ThumbnailSize {
  width: number;
  height: number;
}

/**
 * Scales `width` x `height` uniformly so the area fits `budget` pixels.
 * Images already within the budget keep their size.
 */
export function computeThumbnailSize(width: number, height: number, budget: number): ThumbnailSize {
  const pixels = width * height;
  if (pixels <= budget) {
    return { width, height };
  }
  const scale = Math.sqrt(budget / pixels);
  return {
    width: Math.max(1, Math.floor(width * scale)),
    height: Math.max(1, Math.floor(height * scale))
  };
}

interface EncodedThumbnail {
  data: Buffer;
  format: string;
  width: number;
  height: number;
}

async function reencodeEmbedded(embedded: Buffer): Promise<EncodedThumbnail> {
  const { data, info } = await sharp(embedded).jpeg().toBuffer({ resolveWithObject: true });
  return { data, format: info.format, width: info.width, height: info.height };
}

async function synthesize(source: Buffer, budget: number): Promise<EncodedThumbnail> {
  const image = sharp(source);
  const metadata = await image.metadata();
  if (!metadata.width || !metadata.height || !metadata.format) {
    throw new Error('Cannot determine image dimensions and format');
  }

  const size = computeThumbnailSize(metadata.width, metadata.height, budget);
  const pipeline =
    size.width === metadata.width && size.height === metadata.height
      ? image
      : image.resize(size.width, size.height, { fit: 'fill' });

  const { data, info } = await pipeline
    .toFormat(metadata.format)
    .toBuffer({ resolveWithObject: true });
  return { data, format: info.format, width: info.width, height: info.height };
}

async function attach(
  record: PhotoRecord,
  thumbnail: EncodedThumbnail,
  assetStore: AssetStore
): Promise<ThumbnailRef> {
  const stored = await assetStore.store('thumbnails', thumbnail.data, thumbnail.format);
  const ref: ThumbnailRef = {
    sha256: stored.sha256,
    path: stored.path,
    format: thumbnail.format,
    width: thumbnail.width,
    height: thumbnail.height
  };
  record.thumbnail = ref;
  await record.save();
  return ref;
}

/**
 * Creates the record's thumbnail and saves the record.
 */
export async function createThumbnail(
  record: PhotoRecord,
  deps: ThumbnailDependencies
): Promise<ThumbnailRef> {
  const budget = deps.pixelBudget ?? thumbnailPixelBudget();
  let container: MetadataContainer | null = null;

  try {
    if (record.isJpeg) {
      container = await deps.openContainer(record.imagePath);
      const embedded = await container.thumbnail();
      if (embedded) {
        const ref = await attach(record, await reencodeEmbedded(embedded), deps.assetStore);
        logger.debug({ path: record.imagePath, sha256: ref.sha256 }, 'Used embedded thumbnail');
        return ref;
      }
    }

    const source = await readFile(record.imagePath);
    const thumbnail = await synthesize(source, budget);
    const ref = await attach(record, thumbnail, deps.assetStore);

    // A JPEG without an embedded preview gets the new one written back
    if (container) {
      container.setThumbnail(thumbnail.data);
      await container.flush();
    }

    logger.debug(
      { path: record.imagePath, width: ref.width, height: ref.height, embedded: container !== null },
      'Synthesized thumbnail'
    );
    return ref;
  } finally {
    if (container) {
      await container.close();
    }
  }
}

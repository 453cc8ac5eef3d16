/**
 * Content-Addressed Asset Storage
 *
 * Derived assets (thumbnails) are stored under the SHA-256 hash of their
 * bytes, so regenerating an identical thumbnail reuses the existing file.
 *
 * Storage Layout:
 * data/
 * └── thumbnails/ab/cd/abcd1234...sha256.jpeg
 */

import { createHash } from 'node:crypto';
import { constants } from 'node:fs';
import { access, mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { env } from '../config/index.js';

/**
 * Storage categories for organizing files
 */
export type StorageCategory = 'thumbnails';

/**
 * Result of storing a file
 */
export interface StoreResult {
  /** SHA-256 hash (content address) */
  sha256: string;
  /** Full path to the stored file */
  path: string;
  /** Whether this was a new file (false if deduplicated) */
  isNew: boolean;
}

/**
 * Anything that can keep derived image assets
 */
export interface AssetStore {
  store(category: StorageCategory, data: Buffer, extension: string): Promise<StoreResult>;
}

/**
 * Configuration for content-addressed storage
 */
export interface StorageConfig {
  /** Base directory for all storage */
  basePath: string;
  /** Whether to create directories automatically */
  autoCreateDirs?: boolean;
}

/**
 * Content-Addressed Storage Manager
 */
export class ContentAddressedStorage implements AssetStore {
  private config: Required<StorageConfig>;

  constructor(config?: Partial<StorageConfig>) {
    this.config = {
      basePath: config?.basePath ?? env.STORAGE_PATH,
      autoCreateDirs: config?.autoCreateDirs ?? true
    };
  }

  /**
   * Compute SHA-256 hash of data
   */
  public computeHash(data: Buffer): string {
    return createHash('sha256').update(data).digest('hex');
  }

  /**
   * Get directory sharding path from hash
   * First 2 bytes (4 hex chars) → ab/cd/
   */
  private getShardPath(hash: string): string {
    if (hash.length < 4) {
      throw new Error('Hash too short for sharding');
    }
    return join(hash.substring(0, 2), hash.substring(2, 4));
  }

  /**
   * Get full path for a file based on category and hash
   */
  public getFilePath(category: StorageCategory, hash: string, extension: string): string {
    return join(this.config.basePath, category, this.getShardPath(hash), `${hash}.${extension}`);
  }

  private async ensureDirectory(path: string): Promise<void> {
    if (this.config.autoCreateDirs) {
      await mkdir(dirname(path), { recursive: true });
    }
  }

  private async fileExists(path: string): Promise<boolean> {
    try {
      await access(path, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Store a file under its content hash
   *
   * @param extension - File extension without the dot (image format)
   */
  public async store(category: StorageCategory, data: Buffer, extension: string): Promise<StoreResult> {
    const sha256 = this.computeHash(data);
    const path = this.getFilePath(category, sha256, extension);

    if (await this.fileExists(path)) {
      return { sha256, path, isNew: false };
    }

    await this.ensureDirectory(path);
    await writeFile(path, data);

    return { sha256, path, isNew: true };
  }
}

/**
 * Metadata container contract
 *
 * A container is the opened, fully parsed metadata dictionary of one image
 * file. All tag access in the sync engines goes through this interface;
 * the concrete codec (exiftool) is injected at the composition root.
 *
 * Mutations are buffered in memory until {@link MetadataContainer.flush}.
 */

import type {
  ExifTagKey,
  IptcTagKey,
  MetadataTagKey,
  TagValue
} from '../types/index.js';

import { isExifKey } from './keys.js';

export interface MetadataContainer {
  /** Image file the container was opened from */
  readonly path: string;
  get(key: MetadataTagKey): TagValue | undefined;
  set(key: MetadataTagKey, value: TagValue): void;
  /**
   * @throws {MetadataKeyError} when the key is missing or the codec refuses to delete it
   */
  delete(key: MetadataTagKey): void;
  exifKeys(): ExifTagKey[];
  iptcKeys(): IptcTagKey[];
  /** Embedded preview image, or null when the file has none */
  thumbnail(): Promise<Buffer | null>;
  /** Replace the embedded preview with the given JPEG data */
  setThumbnail(jpeg: Buffer): void;
  /**
   * Persist buffered changes to the file.
   * @throws {MetadataAccessError} with operation `write`
   */
  flush(): Promise<void>;
  /** Release resources held for this file. Safe to call more than once. */
  close(): Promise<void>;
}

/**
 * Opens and parses a file's metadata.
 * Rejects with a {@link MetadataAccessError} (operation `read`) when the file
 * cannot be parsed.
 */
export type ContainerOpener = (path: string) => Promise<MetadataContainer>;

export type MetadataOperation = 'read' | 'write';

/**
 * The metadata of a file could not be read or written
 */
export class MetadataAccessError extends Error {
  public readonly operation: MetadataOperation;
  public readonly path: string;

  constructor(operation: MetadataOperation, path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to ${operation} metadata of ${path}${reason}`, options);
    this.name = 'MetadataAccessError';
    this.operation = operation;
    this.path = path;
  }
}

export type MetadataKeyErrorReason = 'missing' | 'type-mismatch';

/**
 * A single key could not be deleted
 */
export class MetadataKeyError extends Error {
  public readonly key: MetadataTagKey;
  public readonly reason: MetadataKeyErrorReason;

  constructor(key: MetadataTagKey, reason: MetadataKeyErrorReason) {
    super(
      reason === 'missing'
        ? `Metadata key ${key} does not exist`
        : `Metadata key ${key} cannot be deleted for its value type`
    );
    this.name = 'MetadataKeyError';
    this.key = key;
    this.reason = reason;
  }
}

export function isMetadataAccessError(error: unknown): error is MetadataAccessError {
  return error instanceof MetadataAccessError;
}

/**
 * A pending change to one key: a new value, or `null` for a deletion
 */
export type PendingChange = TagValue | null;

/**
 * Dictionary-backed container. Keeps the parsed tags in memory and records
 * every mutation so subclasses can turn them into codec writes on flush.
 */
export abstract class BufferedMetadataContainer implements MetadataContainer {
  protected readonly tags = new Map<MetadataTagKey, TagValue>();
  protected readonly changes = new Map<MetadataTagKey, PendingChange>();
  protected pendingThumbnail: Buffer | null = null;

  constructor(
    public readonly path: string,
    initial: Iterable<[MetadataTagKey, TagValue]> = []
  ) {
    for (const [key, value] of initial) {
      this.tags.set(key, value);
    }
  }

  get(key: MetadataTagKey): TagValue | undefined {
    return this.tags.get(key);
  }

  set(key: MetadataTagKey, value: TagValue): void {
    this.tags.set(key, value);
    this.changes.set(key, value);
  }

  delete(key: MetadataTagKey): void {
    if (!this.tags.has(key)) {
      throw new MetadataKeyError(key, 'missing');
    }
    this.tags.delete(key);
    this.changes.set(key, null);
  }

  exifKeys(): ExifTagKey[] {
    const keys: ExifTagKey[] = [];
    for (const key of this.tags.keys()) {
      if (isExifKey(key)) {
        keys.push(key);
      }
    }
    return keys;
  }

  iptcKeys(): IptcTagKey[] {
    const keys: IptcTagKey[] = [];
    for (const key of this.tags.keys()) {
      if (!isExifKey(key)) {
        keys.push(key);
      }
    }
    return keys;
  }

  setThumbnail(jpeg: Buffer): void {
    this.pendingThumbnail = jpeg;
  }

  /** Whether flush() has anything to write */
  get isDirty(): boolean {
    return this.changes.size > 0 || this.pendingThumbnail !== null;
  }

  async flush(): Promise<void> {
    if (!this.isDirty) {
      return;
    }
    await this.write(new Map(this.changes), this.pendingThumbnail);
    this.changes.clear();
    this.pendingThumbnail = null;
  }

  async close(): Promise<void> {
    // Nothing held by default
  }

  abstract thumbnail(): Promise<Buffer | null>;

  /**
   * Persist the given changes. Must reject with a MetadataAccessError.
   */
  protected abstract write(
    changes: ReadonlyMap<MetadataTagKey, PendingChange>,
    thumbnail: Buffer | null
  ): Promise<void>;
}

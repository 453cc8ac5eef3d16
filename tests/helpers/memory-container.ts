/**
 * In-process metadata container
 *
 * Stands in for the exiftool-backed container: tags live in memory and
 * every flush is recorded so tests can assert what would have been written.
 */

import {
  BufferedMetadataContainer,
  MetadataAccessError,
  MetadataKeyError,
  type ContainerOpener,
  type PendingChange
} from '../../src/metadata/container.js';
import type { MetadataTagKey, TagValue } from '../../src/types/index.js';

export interface FlushRecord {
  changes: Map<MetadataTagKey, PendingChange>;
  thumbnail: Buffer | null;
}

/** Initial tags; keys outside the Exif and IPTC namespaces are ignored */
export type TagFixture = Readonly<Record<string, TagValue>>;

export interface MemoryContainerOptions {
  /** Embedded thumbnail bytes */
  thumbnail?: Buffer | null;
  /** Reject every flush with a write error */
  failOnFlush?: boolean;
  /** Keys whose deletion fails as if their value type were unsupported */
  undeletable?: MetadataTagKey[];
  /** Called after each successful flush with the resulting tags */
  onFlush?: (tags: Map<MetadataTagKey, TagValue>, thumbnail: Buffer | null) => void;
}

export class MemoryContainer extends BufferedMetadataContainer {
  readonly flushes: FlushRecord[] = [];
  closed = false;
  private embeddedThumbnail: Buffer | null;

  constructor(
    path: string,
    tags: TagFixture = {},
    private readonly options: MemoryContainerOptions = {}
  ) {
    super(path, Object.entries(tags).filter(isTagEntry));
    this.embeddedThumbnail = options.thumbnail ?? null;
  }

  override delete(key: MetadataTagKey): void {
    if (this.options.undeletable?.includes(key)) {
      throw new MetadataKeyError(key, 'type-mismatch');
    }
    super.delete(key);
  }

  async thumbnail(): Promise<Buffer | null> {
    return this.pendingThumbnail ?? this.embeddedThumbnail;
  }

  override async close(): Promise<void> {
    this.closed = true;
  }

  /** Current tag values */
  snapshot(): Map<MetadataTagKey, TagValue> {
    return new Map(this.tags);
  }

  protected async write(
    changes: ReadonlyMap<MetadataTagKey, PendingChange>,
    thumbnail: Buffer | null
  ): Promise<void> {
    if (this.options.failOnFlush) {
      throw new MetadataAccessError('write', this.path, { cause: new Error('disk full') });
    }
    this.flushes.push({ changes: new Map(changes), thumbnail });
    if (thumbnail) {
      this.embeddedThumbnail = thumbnail;
    }
    this.options.onFlush?.(new Map(this.tags), this.embeddedThumbnail);
  }
}

function isTagEntry(entry: [string, TagValue]): entry is [MetadataTagKey, TagValue] {
  return entry[0].startsWith('Exif.') || entry[0].startsWith('Iptc.');
}

export interface MemoryOpener {
  open: ContainerOpener;
  /** Number of open attempts, failed ones included */
  readonly opens: number;
  /** Containers handed out, in order */
  readonly containers: MemoryContainer[];
}

/**
 * Opener that hands out containers over one shared tag state, so a second
 * open sees what the previous container flushed.
 */
export function createMemoryOpener(
  tags: TagFixture = {},
  options: MemoryContainerOptions & { failOnOpen?: boolean } = {}
): MemoryOpener {
  let state: TagFixture = { ...tags };
  let embedded = options.thumbnail ?? null;
  let opens = 0;
  const containers: MemoryContainer[] = [];

  const open: ContainerOpener = async path => {
    opens += 1;
    if (options.failOnOpen) {
      throw new MetadataAccessError('read', path, { cause: new Error('not an image') });
    }
    const container = new MemoryContainer(path, state, {
      ...options,
      thumbnail: embedded,
      onFlush: (flushed, thumbnail) => {
        state = Object.fromEntries(flushed);
        embedded = thumbnail;
      }
    });
    containers.push(container);
    return container;
  };

  return {
    open,
    get opens() {
      return opens;
    },
    containers
  };
}

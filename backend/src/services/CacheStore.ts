import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { CacheEntry } from '../types/EnvironmentalData';
import { createLogger } from '../utils/logger';

/**
 * Key-value store with per-entry time-to-live.
 * Implementations may be in-process or backed by an external store;
 * they signal an unreachable backend by throwing CacheUnavailableError.
 */
export interface CacheStore<V> {
  /** Never returns an entry whose insertedAt + ttlMs has elapsed */
  get(key: string): Promise<CacheEntry<V> | undefined>;
  /** Last writer wins; the stored entry is replaced wholesale */
  put(key: string, value: V, ttlMs: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<void>;
  stats(): Promise<CacheStats>;
}

export interface CacheStats {
  entries: number;
  maxEntries: number;
  hits: number;
  misses: number;
  evictions: number;
}

export interface MemoryCacheOptions<V> {
  maxEntries?: number;
  now?: () => number;
  /** Snapshot file used by persist/restore */
  snapshotPath?: string;
  /** Validates values read back from a snapshot; undefined drops the entry. Required for restore */
  revive?: (value: unknown) => V | undefined;
}

const snapshotSchema = z.object({
  version: z.literal(1),
  savedAt: z.number(),
  entries: z.array(
    z.object({
      key: z.string(),
      value: z.unknown(),
      insertedAt: z.number(),
      ttlMs: z.number(),
    })
  ),
});

/**
 * In-process cache store.
 * Expired entries are dropped when read and swept on the next write.
 * When full, the oldest written entry is evicted first.
 */
export class MemoryCacheStore<V> implements CacheStore<V> {
  private static readonly DEFAULT_MAX_ENTRIES = 5000;
  private readonly entries: Map<string, CacheEntry<V>> = new Map();
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly snapshotPath?: string;
  private readonly revive?: (value: unknown) => V | undefined;
  private readonly logger = createLogger({ component: 'CacheStore' });
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: MemoryCacheOptions<V> = {}) {
    this.maxEntries = options.maxEntries ?? MemoryCacheStore.DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? (() => Date.now());
    this.snapshotPath = options.snapshotPath;
    this.revive = options.revive;
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return now >= entry.insertedAt + entry.ttlMs;
  }

  async get(key: string): Promise<CacheEntry<V> | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (this.isExpired(entry, this.now())) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return entry;
  }

  async put(key: string, value: V, ttlMs: number): Promise<void> {
    if (!(ttlMs > 0)) {
      throw new RangeError(`ttlMs must be positive, got ${ttlMs}`);
    }
    const now = this.now();
    this.sweep(now);

    // Re-insert so Map order tracks write order
    this.entries.delete(key);
    this.entries.set(key, Object.freeze({ key, value, insertedAt: now, ttlMs }));

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.logger.info('✓ Cache cleared');
  }

  async stats(): Promise<CacheStats> {
    return {
      entries: this.entries.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
      }
    }
  }

  /**
   * Write live entries to the snapshot file (no-op without snapshotPath)
   */
  async persist(): Promise<number> {
    if (!this.snapshotPath) {
      return 0;
    }
    const now = this.now();
    this.sweep(now);
    const snapshot = {
      version: 1,
      savedAt: now,
      entries: Array.from(this.entries.values()),
    };

    await mkdir(path.dirname(this.snapshotPath), { recursive: true });
    const tmpPath = `${this.snapshotPath}.tmp`;
    await writeFile(tmpPath, JSON.stringify(snapshot), 'utf8');
    await rename(tmpPath, this.snapshotPath);

    this.logger.info({ path: this.snapshotPath, entries: snapshot.entries.length }, 'Cache snapshot written');
    return snapshot.entries.length;
  }

  /**
   * Load entries from the snapshot file, skipping expired or invalid ones.
   * A missing file is not an error.
   */
  async restore(): Promise<number> {
    if (!this.snapshotPath) {
      return 0;
    }

    let raw: string;
    try {
      raw = await readFile(this.snapshotPath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return 0;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      json = undefined;
    }

    const parsed = snapshotSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn({ path: this.snapshotPath }, 'Ignoring unreadable cache snapshot');
      return 0;
    }

    const now = this.now();
    let restored = 0;
    for (const entry of parsed.data.entries) {
      if (now >= entry.insertedAt + entry.ttlMs) {
        continue;
      }
      const value = this.revive ? this.revive(entry.value) : undefined;
      if (value === undefined) {
        continue;
      }
      this.entries.set(entry.key, Object.freeze({ key: entry.key, value, insertedAt: entry.insertedAt, ttlMs: entry.ttlMs }));
      restored++;
    }

    this.logger.info({ path: this.snapshotPath, restored }, 'Cache snapshot restored');
    return restored;
  }
}

/**
 * EmbeddingCache: in-memory cache keyed by sha256(model:content), with
 * optional persistence to a directory.
 *
 * get/put are synchronous, so a get/put pair on one key can never
 * interleave with another caller's. Vectors are copied on the way in and
 * out. Owned by a single pipeline.
 *
 * On disk: {directory}/index.json holds entry bookkeeping and each vector
 * lives in {directory}/{key[0..2]}/{key}.bin in the embedding codec format.
 */

import { createHash } from 'node:crypto';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { DEFAULT_CACHE_MAX_SIZE, DEFAULT_CACHE_TTL_SECONDS, StorageError, getErrorMessage } from '@scriptdex/core';
import { serializeEmbedding, deserializeEmbedding } from './codec.js';
import { hasErrorCode, removeIfPresent } from '../fs.js';
import { createLogger } from '../logger.js';

const log = createLogger('EmbeddingCache');

const INDEX_FILE = 'index.json';
const KEY_PATTERN = /^[0-9a-f]{64}$/;

const cacheIndexSchema = z.object({
  version: z.literal(1),
  entries: z.record(
    z.object({
      model: z.string(),
      createdAt: z.number(),
      lastAccess: z.number(),
      accessCount: z.number().int().nonnegative(),
    }),
  ),
});

type CacheIndex = z.infer<typeof cacheIndexSchema>;

export type CacheStrategy = 'lru' | 'ttl' | 'lfu' | 'fifo';

export const CACHE_STRATEGIES: readonly CacheStrategy[] = ['lru', 'ttl', 'lfu', 'fifo'];

export interface CacheEntry {
  model: string;
  vector: Float32Array;
  /** Insertion time (ms since epoch) */
  createdAt: number;
  /** Last get/put time (ms since epoch) */
  lastAccess: number;
  accessCount: number;
  /** Monotonic access sequence; orders LRU ties that share a timestamp */
  accessSeq: number;
}

export interface CacheStats {
  entries: number;
  sizeBytes: number;
  models: string[];
  strategy: CacheStrategy;
  maxSize: number;
}

export interface EmbeddingCacheOptions {
  strategy?: CacheStrategy;
  maxSize?: number;
  ttlSeconds?: number;
  /** Persist entries here on save() and read them back on load() */
  directory?: string;
  /** Clock in ms; injectable for tests */
  now?: () => number;
}

export function cacheKey(content: string, model: string): string {
  return createHash('sha256').update(`${model}:${content}`).digest('hex');
}

export class EmbeddingCache {
  readonly strategy: CacheStrategy;
  readonly maxSize: number;
  readonly ttlSeconds: number;
  readonly directory?: string;
  private readonly now: () => number;
  private readonly entries = new Map<string, CacheEntry>();
  // keys written or dropped since the last save
  private readonly dirty = new Set<string>();
  private readonly removed = new Set<string>();
  private seq = 0;

  constructor(options: EmbeddingCacheOptions = {}) {
    this.strategy = options.strategy ?? 'lru';
    this.maxSize = Math.max(1, options.maxSize ?? DEFAULT_CACHE_MAX_SIZE);
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    this.directory = options.directory;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(content: string, model: string): Float32Array | null {
    const key = cacheKey(content, model);
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (this.strategy === 'ttl' && this.isExpired(entry)) {
      this.drop(key);
      log.debug('Expired cache entry', { key });
      return null;
    }

    entry.lastAccess = this.now();
    entry.accessCount += 1;
    entry.accessSeq = ++this.seq;
    return entry.vector.slice();
  }

  put(content: string, model: string, vector: Float32Array): void {
    const key = cacheKey(content, model);
    if (!this.entries.has(key) && this.entries.size >= this.maxSize) {
      this.evict();
    }
    const now = this.now();
    this.entries.set(key, {
      model,
      vector: new Float32Array(vector),
      createdAt: now,
      lastAccess: now,
      accessCount: 1,
      accessSeq: ++this.seq,
    });
    this.dirty.add(key);
    this.removed.delete(key);
  }

  /** Remove one entry. Returns whether it existed. */
  invalidate(content: string, model: string): boolean {
    return this.drop(cacheKey(content, model));
  }

  /** Remove every entry produced by `model`. Returns the removed count. */
  invalidateModel(model: string): number {
    let count = 0;
    for (const [key, entry] of this.entries) {
      if (entry.model === model) {
        this.drop(key);
        count++;
      }
    }
    if (count > 0) log.info(`Invalidated ${count} cache entries for model ${model}`);
    return count;
  }

  /** Remove entries inserted more than `maxAgeSeconds` ago. */
  cleanupOldEntries(maxAgeSeconds: number): number {
    const cutoff = this.now() - maxAgeSeconds * 1000;
    let count = 0;
    for (const [key, entry] of this.entries) {
      if (entry.createdAt < cutoff) {
        this.drop(key);
        count++;
      }
    }
    if (count > 0) log.info(`Removed ${count} cache entries older than ${maxAgeSeconds}s`);
    return count;
  }

  clear(): number {
    const count = this.entries.size;
    for (const key of [...this.entries.keys()]) this.drop(key);
    log.info(`Cleared ${count} cache entries`);
    return count;
  }

  getStats(): CacheStats {
    let sizeBytes = 0;
    const models = new Set<string>();
    for (const entry of this.entries.values()) {
      sizeBytes += entry.vector.byteLength;
      models.add(entry.model);
    }
    return {
      entries: this.entries.size,
      sizeBytes,
      models: [...models].sort(),
      strategy: this.strategy,
      maxSize: this.maxSize,
    };
  }

  /**
   * Read entries saved by {@link save}. Entries already in memory are
   * kept; loaded ones are added oldest access first, so eviction still
   * applies. Returns the number loaded; 0 without a directory or index.
   */
  async load(): Promise<number> {
    const directory = this.directory;
    if (!directory) return 0;

    const index = await this.readIndex(directory);
    if (!index) return 0;

    const records = Object.entries(index.entries).sort(([, a], [, b]) => a.lastAccess - b.lastAccess);
    let loaded = 0;
    for (const [key, record] of records) {
      if (!KEY_PATTERN.test(key) || this.entries.has(key)) continue;
      if (this.strategy === 'ttl' && this.now() - record.createdAt > this.ttlSeconds * 1000) continue;

      let vector: Float32Array;
      try {
        vector = deserializeEmbedding(await readFile(entryPath(directory, key)));
      } catch (err) {
        log.warn('Skipping unreadable cache entry', { key, error: getErrorMessage(err) });
        continue;
      }

      if (this.entries.size >= this.maxSize) this.evict();
      this.entries.set(key, { ...record, vector, accessSeq: ++this.seq });
      loaded++;
    }

    log.info(`Loaded ${loaded} cache entries`, { directory });
    return loaded;
  }

  /**
   * Write entries changed since the last save, delete files of dropped
   * entries and rewrite the index. Returns the number of entries saved;
   * 0 without a directory.
   */
  async save(): Promise<number> {
    const directory = this.directory;
    if (!directory) return 0;

    const dirty = [...this.dirty];
    const removed = [...this.removed];
    this.dirty.clear();
    this.removed.clear();

    const index: CacheIndex = { version: 1, entries: {} };
    for (const [key, entry] of this.entries) {
      index.entries[key] = {
        model: entry.model,
        createdAt: entry.createdAt,
        lastAccess: entry.lastAccess,
        accessCount: entry.accessCount,
      };
    }

    try {
      await mkdir(directory, { recursive: true });
      for (const key of removed) await removeIfPresent(entryPath(directory, key));
      for (const key of dirty) {
        const entry = this.entries.get(key);
        if (!entry) continue;
        await mkdir(join(directory, key.slice(0, 2)), { recursive: true });
        await writeFile(entryPath(directory, key), serializeEmbedding(entry.vector));
      }
      await writeFile(join(directory, INDEX_FILE), JSON.stringify(index));
    } catch (err) {
      for (const key of dirty) if (this.entries.has(key)) this.dirty.add(key);
      for (const key of removed) if (!this.entries.has(key)) this.removed.add(key);
      throw new StorageError(`Failed to save embedding cache: ${getErrorMessage(err)}`, err);
    }

    log.debug(`Saved ${this.entries.size} cache entries`, { directory });
    return Object.keys(index.entries).length;
  }

  private async readIndex(directory: string): Promise<CacheIndex | null> {
    let raw: string;
    try {
      raw = await readFile(join(directory, INDEX_FILE), 'utf8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return null;
      throw new StorageError(`Failed to read cache index: ${getErrorMessage(err)}`, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      log.warn('Ignoring unreadable cache index', { directory, error: getErrorMessage(err) });
      return null;
    }
    const parsed = cacheIndexSchema.safeParse(json);
    if (!parsed.success) {
      log.warn('Ignoring malformed cache index', { directory });
      return null;
    }
    return parsed.data;
  }

  private drop(key: string): boolean {
    if (!this.entries.delete(key)) return false;
    this.dirty.delete(key);
    if (this.directory) this.removed.add(key);
    return true;
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.createdAt > this.ttlSeconds * 1000;
  }

  private evict(): void {
    const victim = this.pickVictim();
    if (victim !== undefined) {
      this.drop(victim);
      log.debug('Evicted cache entry', { key: victim, strategy: this.strategy });
    }
  }

  private pickVictim(): string | undefined {
    if (this.strategy === 'ttl') {
      for (const [key, entry] of this.entries) {
        if (this.isExpired(entry)) return key;
      }
    }

    let victim: string | undefined;
    let best: CacheEntry | undefined;
    for (const [key, entry] of this.entries) {
      if (!best || this.ranksBelow(entry, best)) {
        victim = key;
        best = entry;
      }
    }
    return victim;
  }

  /** True when `a` should be evicted before `b`. */
  private ranksBelow(a: CacheEntry, b: CacheEntry): boolean {
    switch (this.strategy) {
      case 'lru':
        return a.accessSeq < b.accessSeq;
      case 'lfu':
        return a.accessCount !== b.accessCount ? a.accessCount < b.accessCount : a.accessSeq < b.accessSeq;
      case 'fifo':
      case 'ttl':
        return a.createdAt < b.createdAt;
    }
  }
}

function entryPath(directory: string, key: string): string {
  return join(directory, key.slice(0, 2), `${key}.bin`);
}

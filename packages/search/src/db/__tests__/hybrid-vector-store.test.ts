import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { EntityId, Metadata, VectorSearchHit } from '@scriptdex/core';
import { HybridVectorStore, bestEffort } from '../hybrid-vector-store.js';
import { BlobVectorStore, type VectorStore } from '../vector-store.js';
import type { Logger } from '../../lib/logger.js';

/** In-process Map-backed store with switchable failures. */
class MemoryStore extends BlobVectorStore {
  readonly entries = new Map<string, Float32Array>();
  failWrites = false;
  failDeletes = false;

  private key(type: string, id: EntityId, model: string): string {
    return `${type}:${id}:${model}`;
  }

  async store(type: string, id: EntityId, vector: Float32Array, model: string, _metadata?: Metadata): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
    this.entries.set(this.key(type, id, model), vector);
  }

  async retrieve(type: string, id: EntityId, model: string): Promise<Float32Array | null> {
    return this.entries.get(this.key(type, id, model)) ?? null;
  }

  async delete(type: string, id: EntityId, model?: string): Promise<boolean> {
    if (this.failDeletes) throw new Error('permission denied');
    let removed = false;
    for (const k of [...this.entries.keys()]) {
      if (k.startsWith(`${type}:${id}:`) && (model === undefined || k === this.key(type, id, model))) {
        this.entries.delete(k);
        removed = true;
      }
    }
    return removed;
  }

  async exists(type: string, id: EntityId, model: string): Promise<boolean> {
    return this.entries.has(this.key(type, id, model));
  }
}

class SearchableMemoryStore extends MemoryStore {
  override readonly supportsSearch = true;
  override async search(): Promise<VectorSearchHit[]> {
    return [{ entityId: 1, score: 0.9, metadata: {} }];
  }
}

const silentLogger = (): Logger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn(), isEnabled: vi.fn() });

describe('bestEffort', () => {
  it('resolves true when the operation succeeds', async () => {
    expect(await bestEffort(silentLogger(), 'noop', async () => 'ok')).toBe(true);
  });

  it('resolves false and logs when the operation rejects', async () => {
    const logger = silentLogger();
    expect(await bestEffort(logger, 'Secondary write', async () => Promise.reject(new Error('boom')))).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('Secondary write failed', { error: 'boom' });
  });

  it('resolves false when the operation throws synchronously', async () => {
    const op = (): Promise<void> => {
      throw new Error('sync');
    };
    await expect(bestEffort(silentLogger(), 'sync op', op)).resolves.toBe(false);
  });
});

describe('HybridVectorStore', () => {
  let primary: MemoryStore;
  let secondary: MemoryStore;
  let hybrid: HybridVectorStore;
  const v = new Float32Array([1, 2]);

  beforeEach(() => {
    primary = new MemoryStore();
    secondary = new MemoryStore();
    hybrid = new HybridVectorStore(primary, secondary);
    vi.spyOn(process.stdout, 'write').mockReturnValue(true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes to both stores', async () => {
    await hybrid.store('scene', 1, v, 'm');
    expect(await primary.exists('scene', 1, 'm')).toBe(true);
    expect(await secondary.exists('scene', 1, 'm')).toBe(true);
  });

  it('propagates primary write failures', async () => {
    primary.failWrites = true;
    await expect(hybrid.store('scene', 1, v, 'm')).rejects.toThrow('disk full');
    expect(await secondary.exists('scene', 1, 'm')).toBe(false);
  });

  it('swallows secondary write failures', async () => {
    secondary.failWrites = true;
    await expect(hybrid.store('scene', 1, v, 'm')).resolves.toBeUndefined();
    expect(await primary.exists('scene', 1, 'm')).toBe(true);
  });

  it('writes a secondary-only value through to the primary on retrieve', async () => {
    await secondary.store('scene', 2, v, 'm');
    expect(await hybrid.retrieve('scene', 2, 'm')).toBe(v);
    expect(await primary.exists('scene', 2, 'm')).toBe(true);
  });

  it('still returns the secondary value when write-through fails', async () => {
    await secondary.store('scene', 2, v, 'm');
    primary.failWrites = true;
    expect(await hybrid.retrieve('scene', 2, 'm')).toBe(v);
    expect(await primary.exists('scene', 2, 'm')).toBe(false);
    expect(await hybrid.exists('scene', 2, 'm')).toBe(true);
  });

  it('returns null when neither store has the value', async () => {
    expect(await hybrid.retrieve('scene', 3, 'm')).toBeNull();
    expect(await new HybridVectorStore(primary).retrieve('scene', 3, 'm')).toBeNull();
  });

  it('delete returns true when either store removed the entry', async () => {
    await secondary.store('scene', 4, v, 'm');
    expect(await hybrid.delete('scene', 4, 'm')).toBe(true);

    await primary.store('scene', 5, v, 'm');
    expect(await hybrid.delete('scene', 5, 'm')).toBe(true);

    expect(await hybrid.delete('scene', 6, 'm')).toBe(false);
  });

  it('delete swallows secondary failures', async () => {
    await primary.store('scene', 7, v, 'm');
    secondary.failDeletes = true;
    expect(await hybrid.delete('scene', 7)).toBe(true);
  });

  it('search delegates to the primary and mirrors its capability', async () => {
    expect(hybrid.supportsSearch).toBe(false);
    const searchable: VectorStore = new SearchableMemoryStore();
    const withSearch = new HybridVectorStore(searchable, secondary);
    expect(withSearch.supportsSearch).toBe(true);
    expect(await withSearch.search(v, 'scene', 'm', 5)).toEqual([{ entityId: 1, score: 0.9, metadata: {} }]);
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseSearchQuery } from '@scriptdex/core';
import { createSearchStack, type SearchStack } from '../stack.js';
import { getConfig, type ScriptdexConfig } from '../config.js';
import { createDb } from '../db/index.js';
import { runMigrations } from '../db/migrate.js';
import { seedCorpus } from '../db/__tests__/seed.js';
import { keywordClient } from '../lib/search/__tests__/fakes.js';

describe('createSearchStack', () => {
  let dir: string;
  let config: ScriptdexConfig;
  let stack: SearchStack | null;

  beforeEach(() => {
    vi.spyOn(process.stdout, 'write').mockReturnValue(true);
    dir = mkdtempSync(join(tmpdir(), 'scriptdex-stack-'));
    const dbPath = join(dir, 'scripts.db');
    const db = createDb({ databasePath: dbPath });
    runMigrations(db);
    seedCorpus(db);
    db.$client.close();

    config = {
      ...getConfig(),
      dbPath,
      embeddingsDir: join(dir, 'embeddings'),
      embeddingModel: 'keyword-model',
      embeddingDimensions: 4,
      embeddingApiKey: undefined,
    };
    stack = null;
  });

  afterEach(() => {
    stack?.close();
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('disables semantic search without an API key or client', async () => {
    stack = createSearchStack(config);

    expect(stack.adapter).toBeNull();
    expect(stack.pipeline).toBeNull();

    const response = await stack.engine.search(parseSearchQuery({ rawQuery: 'harbor', textQuery: 'harbor' }));
    expect(response.results.map((r) => r.id)).toEqual(['11']);
  });

  it('indexes into both tiers and finds scenes semantically', async () => {
    const client = keywordClient();
    stack = createSearchStack(config, { client });
    const adapter = stack.adapter;
    expect(adapter).not.toBeNull();
    if (!adapter) return;

    await adapter.indexScenes([
      { id: 10, scriptId: 1, heading: 'INT. LIGHTHOUSE - NIGHT', content: 'Waves crash against the rocks.' },
      { id: 20, scriptId: 2, heading: 'INT. DINER - NIGHT', content: 'Fresh coffee.' },
    ]);

    expect(await stack.store.exists('scene', 10, 'keyword-model')).toBe(true);
    expect(existsSync(join(dir, 'embeddings', 'keyword-model', 'scene', '10.bin'))).toBe(true);

    const response = await stack.engine.search(
      parseSearchQuery({ rawQuery: 'lighthouse', textQuery: 'lighthouse', mode: 'fuzzy' }),
    );

    expect(response.searchMethods).toEqual(['sql', 'semantic']);
    expect(response.results.map((r) => `${r.id}:${r.metadata['match_type']}`)).toEqual(['10:semantic']);
  });

  it('persists the embedding cache to the configured directory', async () => {
    const cacheDir = join(dir, 'cache');
    const first = keywordClient();
    stack = createSearchStack({ ...config, embeddingCacheDir: cacheDir }, { client: first });
    await stack.pipeline?.generateEmbedding('The lighthouse at night');
    expect(await stack.pipeline?.saveCache()).toBe(1);
    expect(existsSync(join(cacheDir, 'index.json'))).toBe(true);
    stack.close();

    const second = keywordClient();
    stack = createSearchStack({ ...config, embeddingCacheDir: cacheDir }, { client: second });
    expect(await stack.pipeline?.loadCache()).toBe(1);
    const vector = await stack.pipeline?.generateEmbedding('The lighthouse at night');

    expect(Array.from(vector ?? [])).toEqual(Array.from(new Float32Array([1, 0.01, 0.01, 0.01])));
    expect(second.embed).not.toHaveBeenCalled();
  });
});

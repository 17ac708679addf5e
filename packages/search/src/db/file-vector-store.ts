/**
 * FileVectorStore: durable, git-friendly embedding storage.
 *
 * Layout: root/{model with '/' → '_'}/{entityType}/{entityId}.bin
 * with an optional same-stem .json metadata sidecar. The root carries a
 * .gitattributes marker routing .bin files through LFS.
 */

import { mkdir, readFile, readdir, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { StorageError, getErrorMessage } from '@scriptdex/core';
import type { EntityId, Metadata } from '@scriptdex/core';
import { BlobVectorStore } from './vector-store.js';
import { serializeEmbedding, deserializeEmbedding } from '../lib/embeddings/codec.js';
import { createLogger } from '../lib/logger.js';
import { hasErrorCode, removeIfPresent } from '../lib/fs.js';

const log = createLogger('FileVectorStore');

const GITATTRIBUTES = '*.bin filter=lfs diff=lfs merge=lfs -text\n';
const ENTITY_TYPE_PATTERN = /^[A-Za-z0-9_-]+$/;

export class FileVectorStore extends BlobVectorStore {
  private initialized: Promise<void> | null = null;

  constructor(private readonly root: string) {
    super();
  }

  /** Path of the payload for (entityType, entityId, model). */
  getEmbeddingPath(entityType: string, entityId: EntityId, model: string): string {
    validateKey(entityType, entityId);
    return join(this.modelDir(model), entityType, `${entityId}.bin`);
  }

  async store(
    entityType: string,
    entityId: EntityId,
    vector: Float32Array,
    model: string,
    metadata?: Metadata,
  ): Promise<void> {
    const path = this.getEmbeddingPath(entityType, entityId, model);
    await this.ensureInitialized();
    try {
      await mkdir(join(this.modelDir(model), entityType), { recursive: true });
      await writeFile(path, serializeEmbedding(vector));
      if (metadata) {
        await writeFile(sidecarPath(path), JSON.stringify(metadata));
      }
    } catch (err) {
      throw new StorageError(`Failed to store embedding at ${path}: ${getErrorMessage(err)}`, err);
    }
  }

  async retrieve(entityType: string, entityId: EntityId, model: string): Promise<Float32Array | null> {
    const path = this.getEmbeddingPath(entityType, entityId, model);
    let bytes: Buffer;
    try {
      bytes = await readFile(path);
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return null;
      log.error('Failed to read embedding', { path, error: getErrorMessage(err) });
      return null;
    }
    try {
      return deserializeEmbedding(bytes);
    } catch (err) {
      log.error('Corrupted embedding payload', { path, error: getErrorMessage(err) });
      return null;
    }
  }

  /** Metadata sidecar for an entry, or null when none was stored. */
  async retrieveMetadata(entityType: string, entityId: EntityId, model: string): Promise<Metadata | null> {
    const path = sidecarPath(this.getEmbeddingPath(entityType, entityId, model));
    try {
      const parsed: unknown = JSON.parse(await readFile(path, 'utf8'));
      return isMetadata(parsed) ? parsed : null;
    } catch (err) {
      if (!hasErrorCode(err, 'ENOENT')) {
        log.warn('Unreadable metadata sidecar', { path, error: getErrorMessage(err) });
      }
      return null;
    }
  }

  async delete(entityType: string, entityId: EntityId, model?: string): Promise<boolean> {
    if (model !== undefined) {
      return this.deleteEntry(this.getEmbeddingPath(entityType, entityId, model));
    }
    validateKey(entityType, entityId);

    let modelDirs: string[];
    try {
      const entries = await readdir(this.root, { withFileTypes: true });
      modelDirs = entries.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return false;
      throw new StorageError(`Failed to list ${this.root}: ${getErrorMessage(err)}`, err);
    }

    // Directory names are already '/'-escaped
    let deleted = false;
    for (const dir of modelDirs) {
      const path = join(this.root, dir, entityType, `${entityId}.bin`);
      if (await this.deleteEntry(path)) deleted = true;
    }
    return deleted;
  }

  async exists(entityType: string, entityId: EntityId, model: string): Promise<boolean> {
    try {
      const info = await stat(this.getEmbeddingPath(entityType, entityId, model));
      return info.isFile();
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return false;
      throw new StorageError(`Failed to stat embedding: ${getErrorMessage(err)}`, err);
    }
  }

  private modelDir(model: string): string {
    return join(this.root, model.replace(/\//g, '_'));
  }

  private async deleteEntry(path: string): Promise<boolean> {
    try {
      const removed = await removeIfPresent(path);
      await removeIfPresent(sidecarPath(path));
      return removed;
    } catch (err) {
      throw new StorageError(`Failed to delete embedding at ${path}: ${getErrorMessage(err)}`, err);
    }
  }

  private ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      this.initialized = this.writeGitattributes().catch((err: unknown) => {
        this.initialized = null;
        throw new StorageError(`Failed to initialise ${this.root}: ${getErrorMessage(err)}`, err);
      });
    }
    return this.initialized;
  }

  private async writeGitattributes(): Promise<void> {
    await mkdir(this.root, { recursive: true });
    try {
      await writeFile(join(this.root, '.gitattributes'), GITATTRIBUTES, { flag: 'wx' });
    } catch (err) {
      if (!hasErrorCode(err, 'EEXIST')) throw err;
    }
  }
}

function validateKey(entityType: string, entityId: EntityId): void {
  if (!ENTITY_TYPE_PATTERN.test(entityType)) {
    throw new StorageError(`Invalid entity type for file storage: ${JSON.stringify(entityType)}`);
  }
  if (!Number.isInteger(entityId)) {
    throw new StorageError(`Invalid entity id for file storage: ${entityId}`);
  }
}

function sidecarPath(binPath: string): string {
  return binPath.replace(/\.bin$/, '.json');
}

function isMetadata(value: unknown): value is Metadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Expected output dimensions per known embedding model.
 */

import { createLogger } from '../logger.js';

const log = createLogger('DimensionRegistry');

export interface ModelInfo {
  name: string;
  dimensions: number;
  maxTokens?: number;
  /** Model accepts a `dimensions` request parameter */
  supportsCustomDimensions?: boolean;
  minCustomDimensions?: number;
  maxCustomDimensions?: number;
}

export type VectorValidation = { valid: true } | { valid: false; error: string };

const OPENAI_MAX_TOKENS = 8191;

const DEFAULT_MODELS: readonly ModelInfo[] = [
  {
    name: 'text-embedding-3-small',
    dimensions: 1536,
    maxTokens: OPENAI_MAX_TOKENS,
    supportsCustomDimensions: true,
    minCustomDimensions: 256,
    maxCustomDimensions: 1536,
  },
  {
    name: 'text-embedding-3-large',
    dimensions: 3072,
    maxTokens: OPENAI_MAX_TOKENS,
    supportsCustomDimensions: true,
    minCustomDimensions: 256,
    maxCustomDimensions: 3072,
  },
  { name: 'text-embedding-ada-002', dimensions: 1536, maxTokens: OPENAI_MAX_TOKENS },
  { name: 'embed-english-v3.0', dimensions: 1024 },
  { name: 'embed-multilingual-v3.0', dimensions: 1024 },
  { name: 'embed-english-light-v3.0', dimensions: 384 },
  { name: 'all-MiniLM-L6-v2', dimensions: 384 },
  { name: 'all-mpnet-base-v2', dimensions: 768 },
  { name: 'e5-small-v2', dimensions: 384 },
  { name: 'e5-base-v2', dimensions: 768 },
  { name: 'e5-large-v2', dimensions: 1024 },
  { name: 'bge-small-en', dimensions: 384 },
  { name: 'bge-base-en', dimensions: 768 },
  { name: 'bge-large-en', dimensions: 1024 },
];

export class DimensionRegistry {
  private readonly models = new Map<string, ModelInfo>();

  constructor(models: readonly ModelInfo[] = DEFAULT_MODELS) {
    for (const model of models) this.register(model);
  }

  register(info: ModelInfo): void {
    this.models.set(info.name, info);
    log.debug(`Registered model: ${info.name} (${info.dimensions}D)`);
  }

  has(model: string): boolean {
    return this.models.has(model);
  }

  getModelInfo(model: string): ModelInfo | undefined {
    return this.models.get(model);
  }

  getDimensions(model: string): number | undefined {
    return this.models.get(model)?.dimensions;
  }

  listModels(): ModelInfo[] {
    return [...this.models.values()];
  }

  /**
   * Whether `model` can produce vectors of `dimensions` length, either
   * natively or through a custom-dimensions request. Unknown models pass.
   */
  acceptsDimensions(model: string, dimensions: number): boolean {
    const info = this.models.get(model);
    if (!info) return true;
    if (info.dimensions === dimensions) return true;
    if (!info.supportsCustomDimensions) return false;
    const min = info.minCustomDimensions ?? 1;
    const max = info.maxCustomDimensions ?? info.dimensions;
    return dimensions >= min && dimensions <= max;
  }

  /** Structural and (for known models) dimensional check. */
  validateVector(vector: ArrayLike<number>, model?: string): VectorValidation {
    if (vector.length === 0) return { valid: false, error: 'Empty vector' };
    for (let i = 0; i < vector.length; i++) {
      if (!Number.isFinite(vector[i])) return { valid: false, error: 'Vector contains NaN or Inf values' };
    }
    if (model) {
      const expected = this.getDimensions(model);
      if (expected !== undefined && vector.length !== expected) {
        return {
          valid: false,
          error: `Dimension mismatch: expected ${expected}, got ${vector.length} for model ${model}`,
        };
      }
    }
    return { valid: true };
  }

  /** Zero-pad or truncate to `target` dimensions. */
  normalizeVector(vector: Float32Array, target: number): Float32Array {
    if (vector.length === target) return vector;
    const out = new Float32Array(target);
    out.set(vector.subarray(0, target));
    return out;
  }

  /** float32 storage estimate for `count` embeddings of `model` (1536 when unknown). */
  estimateStorageBytes(model: string, count: number): number {
    return (this.getDimensions(model) ?? 1536) * 4 * count;
  }
}

/**
 * @scriptdex/core: Typed Errors
 */

/**
 * Safely extract an error message from an unknown catch value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}

/**
 * Base error class for all Scriptdex errors.
 */
export class ScriptdexError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'ScriptdexError';
    this.code = code;
    this.details = details;
  }
}

export type EmbeddingDecodeErrorCode =
  | 'TOO_SHORT'
  | 'ZERO_DIMENSION'
  | 'DIMENSION_TOO_LARGE'
  | 'SIZE_MISMATCH';

/**
 * Thrown when a stored embedding payload is structurally invalid.
 */
export class EmbeddingDecodeError extends ScriptdexError {
  declare readonly code: EmbeddingDecodeErrorCode;

  constructor(code: EmbeddingDecodeErrorCode, message: string) {
    super(message, code);
    this.name = 'EmbeddingDecodeError';
  }
}

/**
 * Thrown when the embedding provider reports an error or returns nothing.
 */
export class GenerationError extends ScriptdexError {
  constructor(message: string, details?: unknown) {
    super(message, 'GENERATION_FAILED', details);
    this.name = 'GenerationError';
  }
}

/**
 * Thrown on filesystem or database failure while persisting embeddings.
 */
export class StorageError extends ScriptdexError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORAGE_ERROR', details);
    this.name = 'StorageError';
  }
}

/**
 * Thrown when the semantic enhancement step of a search fails.
 */
export class SemanticSearchError extends ScriptdexError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SEMANTIC_SEARCH_FAILED', cause);
    this.name = 'SemanticSearchError';
  }
}

/**
 * Thrown when a store is asked for a capability it does not have.
 */
export class NotSupportedError extends ScriptdexError {
  constructor(message: string) {
    super(message, 'NOT_SUPPORTED');
    this.name = 'NotSupportedError';
  }
}

/**
 * Thrown on invalid configuration or misuse of a component.
 */
export class ConfigurationError extends ScriptdexError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

import { describe, it, expect } from 'vitest';
import {
  getErrorMessage,
  ScriptdexError,
  EmbeddingDecodeError,
  GenerationError,
  StorageError,
  SemanticSearchError,
  NotSupportedError,
  ConfigurationError,
} from '../errors.js';

describe('getErrorMessage', () => {
  it('returns message from Error instance', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('returns message from TypeError instance', () => {
    expect(getErrorMessage(new TypeError('type boom'))).toBe('type boom');
  });

  it('returns string as-is', () => {
    expect(getErrorMessage('something failed')).toBe('something failed');
  });

  it('returns Unknown error for number', () => {
    expect(getErrorMessage(42)).toBe('Unknown error');
  });

  it('returns Unknown error for null', () => {
    expect(getErrorMessage(null)).toBe('Unknown error');
  });

  it('returns Unknown error for object with message property', () => {
    expect(getErrorMessage({ message: 'not an error' })).toBe('Unknown error');
  });
});

describe('error classes', () => {
  it('EmbeddingDecodeError carries the structural reason as its code', () => {
    const err = new EmbeddingDecodeError('ZERO_DIMENSION', 'Embedding dimension cannot be zero');
    expect(err).toBeInstanceOf(ScriptdexError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('EmbeddingDecodeError');
    expect(err.code).toBe('ZERO_DIMENSION');
    expect(err.message).toBe('Embedding dimension cannot be zero');
  });

  it.each([
    [new GenerationError('no data'), 'GenerationError', 'GENERATION_FAILED'],
    [new StorageError('disk full'), 'StorageError', 'STORAGE_ERROR'],
    [new SemanticSearchError('adapter threw'), 'SemanticSearchError', 'SEMANTIC_SEARCH_FAILED'],
    [new NotSupportedError('no search'), 'NotSupportedError', 'NOT_SUPPORTED'],
    [new ConfigurationError('bad config'), 'ConfigurationError', 'CONFIGURATION_ERROR'],
  ])('%s has name %s and code %s', (err, name, code) => {
    expect(err).toBeInstanceOf(ScriptdexError);
    expect(err.name).toBe(name);
    expect(err.code).toBe(code);
  });

  it('keeps details for later inspection', () => {
    const err = new GenerationError('failed', { model: 'm', itemId: 'single' });
    expect(err.details).toEqual({ model: 'm', itemId: 'single' });
  });
});

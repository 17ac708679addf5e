/**
 * @scriptdex/core: Shared types, validation schemas, and utilities
 */

// Re-export all types
export * from './types.js';

// Re-export schemas
export * from './schemas.js';

// Re-export constants
export * from './constants.js';

// Re-export error types and utilities
export * from './errors.js';

/**
 * @rowcast/core
 *
 * Shared types, errors and value helpers for schema-directed record conversion
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

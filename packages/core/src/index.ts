/**
 * @callbridge/core
 *
 * Record types, collaborator contracts, errors, logging and the field
 * resolver shared by every package.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './logging/logger.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

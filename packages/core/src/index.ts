/**
 * @tablediff/core
 *
 * Table types, connector interface and shared utilities
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Utilities
export * from './utils/index.js';

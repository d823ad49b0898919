/**
 * subgap Plugin Utilities
 * Shared utilities for building subgap plugins
 */

export * from './types.js';
export * from './logger.js';
export * from './http.js';
export * from './validation.js';

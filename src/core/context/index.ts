/**
 * Context system
 * Registry of contexts and profiles, and context name resolution
 */

export * from './types.js';
export * from './registry.js';
export * from './context-scope.js';

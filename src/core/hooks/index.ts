/**
 * Hook Bus - Main Export
 */

export * from './types.js';
export * from './hook-bus.js';

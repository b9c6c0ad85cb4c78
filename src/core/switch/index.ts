export * from './transition-state.js';
export * from './switch-engine.js';

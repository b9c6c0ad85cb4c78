export * from './logger/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export * from './context/index.js';
export * from './hooks/index.js';
export * from './switch/index.js';
export * from './profiles/index.js';
export * from './env.js';

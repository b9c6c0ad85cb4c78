export * from './profiles-config.schema.js';

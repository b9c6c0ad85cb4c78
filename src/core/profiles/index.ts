export * from './profile-manager.js';

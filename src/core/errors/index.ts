export * from './profile-errors.js';

export * from './errors.js';
export * from './types.js';
export * from './profiles.js';
export * from './client.js';

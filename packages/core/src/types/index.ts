export * from './api.js';
export * from './entity.js';
export * from './events.js';
export * from './operation.js';
export * from './storage.js';

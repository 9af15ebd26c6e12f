// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

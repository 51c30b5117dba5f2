export * from './errors/index.js';
export * from './signers/index.js';
export * from './grants/index.js';
export * from './utils/index.js';
export * from './client/index.js';
export * from './config/index.js';

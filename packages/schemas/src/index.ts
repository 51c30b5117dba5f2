export * from './config/index.js';
export * from './token/index.js';

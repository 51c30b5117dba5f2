export * from './result.js';
export * from './task/index.js';
export * from './transports/index.js';
export * from './http/index.js';
export * from './utils/request/index.js';

export * from './logging/index.js';

export { EnvVarPatternResolver, EnvironmentResolutionError } from './env/index.js';

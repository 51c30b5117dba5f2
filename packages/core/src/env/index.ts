export { EnvVarPatternResolver, EnvironmentResolutionError } from './environment-resolver.js';

import type { EnvVarPatternResolverConfig } from '@authwire/models';

const PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::([^}]*))?\}/gi;
const VARIABLE_NAME = /^[A-Z_][A-Z0-9_]*$/;

/**
 * Error thrown when a `${VAR}` pattern cannot be resolved.
 * @public
 */
export class EnvironmentResolutionError extends Error {
  public constructor(
    message: string,
    public readonly variable?: string,
  ) {
    super(message);
    this.name = 'EnvironmentResolutionError';
    Object.setPrototypeOf(this, EnvironmentResolutionError.prototype);
  }

  public static missingVariable(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Required environment variable '${variable}' is not defined`,
      variable,
    );
  }

  public static circularReference(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Circular reference detected in environment variable '${variable}'`,
      variable,
    );
  }

  public static maxDepthExceeded(depth: number): EnvironmentResolutionError {
    return new EnvironmentResolutionError(`Maximum resolution depth of ${depth} exceeded`);
  }

  public static invalidPattern(pattern: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(`Invalid environment variable pattern: ${pattern}`);
  }
}

/**
 * Resolves `${VAR}` and `${VAR:default}` patterns in configuration values.
 *
 * Values pulled from the environment may themselves contain patterns; those
 * are resolved recursively up to `maxDepth`, and a variable that refers back
 * to itself is rejected.
 *
 * @example
 * ```typescript
 * const resolver = new EnvVarPatternResolver({ envSource: { CLIENT_ID: 'demo' } });
 * resolver.resolve('${CLIENT_ID}-${REGION:eu}'); // 'demo-eu'
 * ```
 * @public
 */
export class EnvVarPatternResolver {
  private readonly maxDepth: number;
  private readonly strict: boolean;
  private readonly envSource: Record<string, string | undefined>;

  public constructor(config: EnvVarPatternResolverConfig = {}) {
    this.maxDepth = config.maxDepth ?? 10;
    this.strict = config.strict ?? true;
    this.envSource = config.envSource ?? process.env;
  }

  /**
   * Resolves every pattern in a single string.
   * @throws {EnvironmentResolutionError} on a missing variable in strict mode,
   * a circular reference or when `maxDepth` is exceeded
   */
  public resolve(value: string): string {
    return this.resolveAt(value, new Set(), 0);
  }

  /**
   * Resolves patterns in every string of a JSON-like value, walking arrays and
   * plain objects. Non-string leaves are returned unchanged.
   */
  public resolveDeep(value: unknown): unknown {
    if (typeof value === 'string') {
      return EnvVarPatternResolver.containsPattern(value) ? this.resolve(value) : value;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.resolveDeep(item));
    }
    if (typeof value === 'object' && value !== null) {
      return Object.fromEntries(
        Object.entries(value).map(([key, item]) => [key, this.resolveDeep(item)]),
      );
    }
    return value;
  }

  private resolveAt(value: string, visited: Set<string>, depth: number): string {
    if (depth > this.maxDepth) {
      throw EnvironmentResolutionError.maxDepthExceeded(this.maxDepth);
    }

    return value.replace(PATTERN, (match, varName: string, defaultValue?: string) => {
      if (!VARIABLE_NAME.test(varName)) {
        throw EnvironmentResolutionError.invalidPattern(match);
      }
      if (visited.has(varName)) {
        throw EnvironmentResolutionError.circularReference(varName);
      }

      const next = new Set(visited).add(varName);
      const envValue = this.envSource[varName];

      if (envValue !== undefined) {
        return this.resolveAt(envValue, next, depth + 1);
      }
      if (defaultValue !== undefined) {
        return this.resolveAt(defaultValue, next, depth + 1);
      }
      if (this.strict) {
        throw EnvironmentResolutionError.missingVariable(varName);
      }
      return match;
    });
  }

  public static containsPattern(value: string): boolean {
    return /\$\{[A-Z_][A-Z0-9_]*(?::[^}]*)?\}/i.test(value);
  }
}

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { deepmergeCustom } from 'deepmerge-ts';
import type { ClientConfig } from '@authwire/models';
import { ClientConfigSchema } from '@authwire/schemas';
import { EnvironmentResolutionError, EnvVarPatternResolver, logEvent } from '@authwire/core';
import { AuthenticationError } from '../errors/authentication-error.js';

export interface LoadClientConfigOptions {
  /** Variable source for `${VAR}` patterns, `process.env` unless given */
  envSource?: Record<string, string | undefined>;
  /** Keep unresolved patterns instead of throwing. Defaults to false. */
  lenient?: boolean;
}

export interface LoadedClientConfig {
  config: ClientConfig;
  sources: string[];
}

/**
 * Config file used when none is named: `AUTHWIRE_CONFIG`, else
 * `authwire.json` in `cwd`.
 */
export function getDefaultConfigPath(cwd = process.cwd()): string {
  const override = process.env.AUTHWIRE_CONFIG;
  if (override && override.trim()) return resolve(cwd, override);
  return resolve(cwd, 'authwire.json');
}

function readJsonObject(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw AuthenticationError.configNotFound(path, error instanceof Error ? error : undefined);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw AuthenticationError.invalidConfig(
      `${path} is not valid JSON`,
      error instanceof Error ? error : undefined,
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw AuthenticationError.invalidConfig(`${path} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

const merge = deepmergeCustom<Record<string, unknown>>({
  mergeArrays: (values) => values[values.length - 1],
});

/**
 * Validates an in-memory config value after resolving its `${VAR}` patterns.
 * @throws {AuthenticationError} on an unresolvable variable or an invalid shape
 */
export function parseClientConfig(
  raw: unknown,
  options: LoadClientConfigOptions = {},
): ClientConfig {
  const resolver = new EnvVarPatternResolver({
    envSource: options.envSource,
    strict: !options.lenient,
  });

  let resolved: unknown;
  try {
    resolved = resolver.resolveDeep(raw);
  } catch (error) {
    if (error instanceof EnvironmentResolutionError) {
      throw AuthenticationError.envResolutionFailed(error);
    }
    throw error;
  }

  const parsed = ClientConfigSchema.safeParse(resolved);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw AuthenticationError.invalidConfig(issues, parsed.error);
  }
  return parsed.data;
}

/**
 * Reads one or more JSON config files and merges them, later files winning
 * key by key (nested objects merge, arrays are replaced).
 *
 * @example
 * ```typescript
 * const { config } = loadClientConfig(['authwire.json', 'authwire.local.json']);
 * const client = createAuthClient(config);
 * ```
 * @throws {AuthenticationError} when a file is missing or malformed, or the
 * merged result is invalid
 */
export function loadClientConfig(
  paths: string | readonly string[] = getDefaultConfigPath(),
  options: LoadClientConfigOptions = {},
): LoadedClientConfig {
  const sources = typeof paths === 'string' ? [paths] : [...paths];
  if (sources.length === 0) {
    throw AuthenticationError.invalidConfig('no configuration file given');
  }

  const merged = merge({}, ...sources.map(readJsonObject));
  const config = parseClientConfig(merged, options);

  logEvent('info', 'config:loaded', { sources, auth: config.auth.type });
  return { config, sources };
}

/**
 * Configuration loading from environment variables
 *
 * Provides typed accessors for environment-based settings. File-based
 * settings live in yaml-config.ts.
 */

import { ConfigurationError } from '../errors.js';

export * from './yaml-config.js';

/**
 * Read an optional numeric environment variable
 */
export function getNumberEnv(name: string, env: NodeJS.ProcessEnv = process.env): number | undefined {
  const raw = env[name];

  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got '${raw}'`, name);
  }

  return value;
}

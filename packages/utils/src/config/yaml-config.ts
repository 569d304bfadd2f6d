/**
 * YAML Configuration Loader
 * ==========================
 * Loads configuration from config.yaml file with fallback to environment variables
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { logger } from '../logger.js';

export type AppConfig = Record<string, unknown>;

let cachedConfig: AppConfig | null = null;
let cachedPath: string | null = null;

function isPlainObject(value: unknown): value is AppConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from config.yaml file
 */
export function loadConfigFromYaml(configPath?: string): AppConfig {
  const resolvedPath = configPath || join(process.cwd(), 'config.yaml');

  if (cachedConfig !== null && cachedPath === resolvedPath) {
    return cachedConfig;
  }
  cachedPath = resolvedPath;

  if (!existsSync(resolvedPath)) {
    logger.debug('config.yaml not found, using environment variables only', {
      path: resolvedPath,
    });
    cachedConfig = {};
    return cachedConfig;
  }

  try {
    const content = readFileSync(resolvedPath, 'utf-8');
    const parsed: unknown = load(content);
    const config = isPlainObject(parsed) ? parsed : {};
    logger.info('Loaded configuration from config.yaml', { path: resolvedPath });
    cachedConfig = config;
    return config;
  } catch (error) {
    logger.warn('Failed to load config.yaml, using environment variables only', {
      path: resolvedPath,
      error: error instanceof Error ? error.message : String(error),
    });
    cachedConfig = {};
    return cachedConfig;
  }
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  cachedPath = null;
}

/**
 * Config Loader
 *
 * Loads config/chunkwise.json with {env:VAR} resolution.
 * Supports CHUNKWISE_CONFIG env var to override config path.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { type Config, configSchema } from './schema';

const DEFAULT_CONFIG_PATH = 'config/chunkwise.json';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
  }
}

/**
 * Resolve {env:VAR} patterns in text.
 * Returns empty string if env var is not set.
 */
export function resolveEnvVars(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\{env:([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
    return env[varName] ?? '';
  });
}

/**
 * Validate an already-parsed config object.
 */
export function parseConfig(data: unknown): Config {
  const result = configSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(
      'Invalid config:',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Load and validate config from file.
 */
export function loadConfig(configPath: string): Config {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(
        `Config file not found: ${configPath}. ` +
          'Copy config/chunkwise.example.json to config/chunkwise.json and configure it.'
      );
    }
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(resolveEnvVars(text));
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  return parseConfig(data);
}

// Lazy load and cache
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    const configPath =
      process.env['CHUNKWISE_CONFIG'] ?? resolve(process.cwd(), DEFAULT_CONFIG_PATH);
    cachedConfig = loadConfig(configPath);
  }
  return cachedConfig;
}

/**
 * Drop the cached config so the next getConfig() reads the file again.
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Configuration System Tests
 *
 * Tests for the config loader and schema validation.
 * Focuses on {env:VAR} resolution, defaults and provider-specific validation.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { ConfigError, loadConfig, parseConfig, resolveEnvVars } from '@/config/config';
import { configSchema } from '@/config/schema';
import { VALID_FULL_CONFIG, VALID_MINIMAL_CONFIG } from '../helpers/fixtures';

describe('configSchema', () => {
  describe('valid configurations', () => {
    test('accepts minimal OpenAI config', () => {
      const result = configSchema.safeParse(VALID_MINIMAL_CONFIG);
      expect(result.success).toBe(true);
    });

    test('accepts an empty config', () => {
      const result = configSchema.safeParse({});
      expect(result.success).toBe(true);
    });

    test('accepts openai-compatible config with all required fields', () => {
      const result = configSchema.safeParse(VALID_FULL_CONFIG);
      expect(result.success).toBe(true);
    });

    test('applies engine and pipeline defaults when not specified', () => {
      const config = parseConfig(VALID_MINIMAL_CONFIG);
      expect(config.engine).toEqual({ strictMode: false, batchSize: 8 });
      expect(config.pipeline).toEqual({ inPlace: false, verbose: false, validateChain: true });
    });

    test('keeps explicit engine and pipeline settings', () => {
      const config = parseConfig(VALID_FULL_CONFIG);
      expect(config.engine).toEqual({ strictMode: true, batchSize: 4 });
      expect(config.pipeline).toEqual({ inPlace: true, verbose: false, validateChain: false });
    });
  });

  describe('provider validation', () => {
    test('rejects OpenAI provider without apiKey', () => {
      const result = configSchema.safeParse({ llm: { provider: 'openai', model: 'gpt-4o-mini' } });
      expect(result.success).toBe(false);
    });

    test('rejects OpenAI provider with baseUrl', () => {
      const config = {
        llm: { ...VALID_MINIMAL_CONFIG.llm, baseUrl: 'https://example.com' }
      };
      expect(configSchema.safeParse(config).success).toBe(false);
    });

    test('rejects openai-compatible provider without baseUrl', () => {
      const config = { llm: { provider: 'openai-compatible', model: 'local-model' } };
      expect(configSchema.safeParse(config).success).toBe(false);
    });

    test('rejects providerName on a non openai-compatible provider', () => {
      const config = { llm: { ...VALID_MINIMAL_CONFIG.llm, providerName: 'gateway' } };
      expect(configSchema.safeParse(config).success).toBe(false);
    });

    test('allows ollama embedding without apiKey', () => {
      const config = {
        embedding: { provider: 'ollama', model: 'nomic-embed-text', dimensions: 768 }
      };
      expect(configSchema.safeParse(config).success).toBe(true);
    });

    test('requires embedding dimensions', () => {
      const config = {
        embedding: { provider: 'cohere', model: 'embed-english-v3.0', apiKey: 'test-secret' }
      };
      expect(configSchema.safeParse(config).success).toBe(false);
    });

    test('rejects a non-positive batch size', () => {
      expect(configSchema.safeParse({ engine: { batchSize: 0 } }).success).toBe(false);
    });
  });
});

describe('parseConfig', () => {
  test('reports each issue with its path', () => {
    expect(() => parseConfig({ llm: { provider: 'openai', model: 'gpt-4o-mini' } })).toThrow(
      "llm.apiKey: apiKey required for provider 'openai'"
    );
  });

  test('throws ConfigError', () => {
    expect(() => parseConfig({ engine: { batchSize: -1 } })).toThrow(ConfigError);
  });
});

describe('resolveEnvVars', () => {
  test('replaces {env:VAR} with the variable value', () => {
    expect(resolveEnvVars('key={env:TEST_KEY}', { TEST_KEY: 'test-secret' })).toBe(
      'key=test-secret'
    );
  });

  test('replaces unset variables with an empty string', () => {
    expect(resolveEnvVars('"{env:MISSING_KEY}"', {})).toBe('""');
  });

  test('leaves lowercase placeholders alone', () => {
    expect(resolveEnvVars('{env:lower}', { lower: 'x' })).toBe('{env:lower}');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chunkwise-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('loads a file and resolves env vars', () => {
    const path = join(dir, 'chunkwise.json');
    process.env['CHUNKWISE_TEST_KEY'] = 'test-secret';
    writeFileSync(
      path,
      JSON.stringify({
        llm: { provider: 'openai', model: 'gpt-4o-mini', apiKey: '{env:CHUNKWISE_TEST_KEY}' }
      })
    );

    try {
      const config = loadConfig(path);
      expect(config.llm?.apiKey).toBe('test-secret');
    } finally {
      delete process.env['CHUNKWISE_TEST_KEY'];
    }
  });

  test('throws ConfigError for a missing file', () => {
    const path = join(dir, 'missing.json');
    expect(() => loadConfig(path)).toThrow(`Config file not found: ${path}`);
  });

  test('throws ConfigError for invalid JSON', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ "llm": ');
    expect(() => loadConfig(path)).toThrow(`Invalid JSON in config file: ${path}`);
  });
});

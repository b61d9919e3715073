import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadConfig, ConfigError } from './index.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'complaint-analyzer-config-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

const load = (env: NodeJS.ProcessEnv) => loadConfig({ env, cwd: dir, home: dir });

describe('loadConfig', () => {
  it('uses the defaults and takes the API key from the environment', () => {
    const config = load({ GEMINI_API_KEY: 'test-key' });

    expect(config.server).toEqual({ port: 8000, host: '127.0.0.1' });
    expect(config.model).toEqual({
      backend: 'gemini',
      name: 'gemini-2.0-flash',
      temperature: 0.1,
      max_output_tokens: 512,
      api_key: 'test-key'
    });
    expect(config.gateway).toEqual({ timeout_ms: 15000, max_attempts: 3, base_delay_ms: 500, max_delay_ms: 8000 });
    expect(config.analysis.max_input_chars).toBe(2000);
  });

  it('fails without an API key for a hosted backend', () => {
    expect(() => load({})).toThrow(ConfigError);
    expect(() => load({ MODEL_BACKEND: 'anthropic' })).toThrow(
      'ANTHROPIC_API_KEY environment variable is required for the anthropic backend'
    );
  });

  it('merges analyzer.yaml from the working directory over the defaults', () => {
    writeFileSync(
      join(dir, 'analyzer.yaml'),
      ['model:', '  backend: ollama', '  name: llama3.2', 'gateway:', '  max_attempts: 5'].join('\n')
    );

    const config = load({});

    expect(config.model.backend).toBe('ollama');
    expect(config.model.name).toBe('llama3.2');
    expect(config.model.api_key).toBeUndefined();
    expect(config.gateway.max_attempts).toBe(5);
    expect(config.gateway.timeout_ms).toBe(15000);
  });

  it('reads the file named by ANALYZER_CONFIG first', () => {
    writeFileSync(join(dir, 'analyzer.yaml'), 'analysis:\n  max_input_chars: 100\n');
    writeFileSync(join(dir, 'custom.yaml'), 'analysis:\n  max_input_chars: 500\n');

    const config = load({ ANALYZER_CONFIG: 'custom.yaml', GEMINI_API_KEY: 'test-key' });

    expect(config.analysis.max_input_chars).toBe(500);
  });

  it('lets the environment override the file', () => {
    writeFileSync(join(dir, 'analyzer.yaml'), 'server:\n  port: 7000\n');

    const config = load({
      PORT: '9090',
      LOG_LEVEL: 'debug',
      CORS_ORIGINS: 'https://a.example, https://b.example',
      GEMINI_API_KEY: 'test-key'
    });

    expect(config.server.port).toBe(9090);
    expect(config.log.level).toBe('debug');
    expect(config.cors.allowed_origins).toEqual(['https://a.example', 'https://b.example']);
  });

  it('rejects an unknown taxonomy version', () => {
    writeFileSync(join(dir, 'analyzer.yaml'), 'analysis:\n  taxonomy_version: "9.9.9"\n');

    expect(() => load({ GEMINI_API_KEY: 'test-key' })).toThrow(
      'Invalid configuration: analysis.taxonomy_version: Unknown taxonomy version'
    );
  });

  it('rejects a retry ceiling below the base delay', () => {
    writeFileSync(join(dir, 'analyzer.yaml'), 'gateway:\n  base_delay_ms: 1000\n  max_delay_ms: 10\n');

    expect(() => load({ GEMINI_API_KEY: 'test-key' })).toThrow('gateway.max_delay_ms must not be below gateway.base_delay_ms');
  });

  it('freezes the result', () => {
    const config = load({ GEMINI_API_KEY: 'test-key' });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.gateway)).toBe(true);
    expect(Object.isFrozen(config.cors.allowed_origins)).toBe(true);
  });
});

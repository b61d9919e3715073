import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { getTaxonomy } from '../taxonomy/index.js';
import { deepFreeze } from '../freeze.js';

const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().min(0).max(65535),
    host: z.string().min(1)
  }),
  cors: z.object({
    allowed_origins: z.array(z.string())
  }),
  rate_limits: z.object({
    requests_per_minute: z.coerce.number().int().positive()
  }),
  model: z.object({
    backend: z.enum(['anthropic', 'gemini', 'ollama']),
    name: z.string().min(1),
    temperature: z.number().min(0).max(2),
    max_output_tokens: z.number().int().positive(),
    api_key: z.string().min(1).optional(),
    base_url: z.string().url().optional()
  }),
  gateway: z.object({
    timeout_ms: z.number().int().positive(),
    max_attempts: z.number().int().min(1).max(10),
    base_delay_ms: z.number().int().min(0),
    max_delay_ms: z.number().int().min(0)
  }),
  analysis: z.object({
    max_input_chars: z.number().int().positive(),
    taxonomy_version: z.string().refine(version => getTaxonomy(version) !== undefined, {
      message: 'Unknown taxonomy version'
    })
  }),
  log: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
    pretty: z.boolean()
  })
});

export type AnalyzerConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_CONFIG: AnalyzerConfig = {
  server: { port: 8000, host: '127.0.0.1' },
  cors: { allowed_origins: ['http://localhost:*'] },
  rate_limits: { requests_per_minute: 60 },
  model: {
    backend: 'gemini',
    name: 'gemini-2.0-flash',
    temperature: 0.1,
    max_output_tokens: 512
  },
  gateway: {
    timeout_ms: 15000,
    max_attempts: 3,
    base_delay_ms: 500,
    max_delay_ms: 8000
  },
  analysis: {
    max_input_chars: 2000,
    taxonomy_version: '1.0.0'
  },
  log: { level: 'info', pretty: false }
};

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  home?: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }

  return merged;
}

function configPaths(env: NodeJS.ProcessEnv, cwd: string, home: string): string[] {
  const paths = [
    resolve(cwd, 'analyzer.yaml'),
    resolve(home, '.config', 'complaint-analyzer', 'config.yaml')
  ];
  return env.ANALYZER_CONFIG ? [resolve(cwd, env.ANALYZER_CONFIG), ...paths] : paths;
}

function readConfigFile(paths: string[]): Record<string, unknown> {
  for (const path of paths) {
    if (!existsSync(path)) continue;

    const content: unknown = parseYaml(readFileSync(path, 'utf-8'));
    if (content === null || content === undefined) return {};
    if (!isPlainObject(content)) {
      throw new ConfigError(`${path}: expected a mapping at the top level`);
    }
    return content;
  }
  return {};
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    server: { port: env.PORT, host: env.HOST },
    cors: { allowed_origins: env.CORS_ORIGINS?.split(',').map(origin => origin.trim()).filter(Boolean) },
    model: { backend: env.MODEL_BACKEND, name: env.MODEL_NAME, base_url: env.OLLAMA_BASE_URL },
    log: { level: env.LOG_LEVEL }
  };
}

function apiKeyFromEnv(backend: AnalyzerConfig['model']['backend'], env: NodeJS.ProcessEnv): string | undefined {
  switch (backend) {
    case 'anthropic':
      return env.ANTHROPIC_API_KEY;
    case 'gemini':
      return env.GEMINI_API_KEY;
    case 'ollama':
      return undefined;
  }
}

/**
 * Builds the process configuration once at startup: defaults, then the first
 * YAML file found, then environment variables. The result is frozen.
 */
export function loadConfig(options: LoadConfigOptions = {}): AnalyzerConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const home = options.home ?? homedir();

  const merged = deepMerge(
    deepMerge(DEFAULT_CONFIG, readConfigFile(configPaths(env, cwd, home))),
    envOverrides(env)
  );

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const config = parsed.data;
  config.model.api_key = config.model.api_key || apiKeyFromEnv(config.model.backend, env);

  if (config.model.backend !== 'ollama' && !config.model.api_key) {
    const variable = config.model.backend === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'GEMINI_API_KEY';
    throw new ConfigError(`${variable} environment variable is required for the ${config.model.backend} backend`);
  }

  if (config.gateway.max_delay_ms < config.gateway.base_delay_ms) {
    throw new ConfigError('gateway.max_delay_ms must not be below gateway.base_delay_ms');
  }

  return deepFreeze(config);
}

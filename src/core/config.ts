/**
 * Configuration — defaults ← JSON file ← environment.
 *
 * The merged object is validated once; every failure is a ConfigError naming
 * the offending paths.
 */
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './api/errors.js';

export const DEFAULT_CONFIG_FILE = 'agiloft-mcp.json';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const configSchema = z.object({
  agiloft: z.object({
    baseUrl: z.string().url('agiloft.baseUrl must be a URL'),
    username: z.string().min(1, 'agiloft.username is required'),
    password: z.string().min(1, 'agiloft.password is required'),
    kb: z.string().min(1, 'agiloft.kb is required'),
    language: z.string().min(1).default('en'),
  }),
  server: z
    .object({
      logLevel: z.enum(LOG_LEVELS).default('info'),
      /** Seconds. */
      timeout: z.number().positive().default(30),
      searchConcurrency: z.number().int().positive().max(32).default(4),
    })
    .default({}),
});

export type AppConfig = z.output<typeof configSchema>;

export interface LoadConfigOptions {
  /** Explicit config file; when absent, `agiloft-mcp.json` in the cwd is used if present. */
  file?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

type Raw = Record<string, unknown>;

function isObject(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFileLayer(path: string): Raw {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isObject(parsed)) throw new ConfigError(`Config file ${path} must contain a JSON object`);
  return parsed;
}

function numberFromEnv(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) throw new ConfigError(`${name} must be a number, got '${value}'`);
  return n;
}

function envLayer(env: NodeJS.ProcessEnv): Raw {
  const agiloft: Raw = {};
  const server: Raw = {};
  const set = (target: Raw, key: string, value: unknown) => {
    if (value !== undefined && value !== '') target[key] = value;
  };

  set(agiloft, 'baseUrl', env.AGILOFT_BASE_URL);
  set(agiloft, 'username', env.AGILOFT_USERNAME);
  set(agiloft, 'password', env.AGILOFT_PASSWORD);
  set(agiloft, 'kb', env.AGILOFT_KB);
  set(agiloft, 'language', env.AGILOFT_LANGUAGE);
  set(server, 'logLevel', env.MCP_LOG_LEVEL?.toLowerCase());
  set(server, 'timeout', numberFromEnv('MCP_TIMEOUT', env.MCP_TIMEOUT));
  set(server, 'searchConcurrency', numberFromEnv('MCP_SEARCH_CONCURRENCY', env.MCP_SEARCH_CONCURRENCY));

  return { agiloft, server };
}

/** Shallow-per-section merge: later layers win key by key. */
function mergeLayers(...layers: Raw[]): Raw {
  const out: Raw = {};
  for (const layer of layers) {
    for (const [section, value] of Object.entries(layer)) {
      const prev = out[section];
      out[section] = isObject(prev) && isObject(value) ? { ...prev, ...value } : value;
    }
  }
  return out;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let fileLayer: Raw = {};
  if (options.file) {
    fileLayer = readFileLayer(resolve(cwd, options.file));
  } else {
    const fallback = resolve(cwd, DEFAULT_CONFIG_FILE);
    if (existsSync(fallback)) fileLayer = readFileLayer(fallback);
  }

  const parsed = configSchema.safeParse(mergeLayers(fileLayer, envLayer(env)));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return parsed.data;
}

/** Copy safe to print: the password is masked. */
export function maskConfig(config: AppConfig): AppConfig {
  return { ...config, agiloft: { ...config.agiloft, password: '********' } };
}

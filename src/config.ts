/**
 * Configuration
 *
 * Built once at startup from an optional JSON file overlaid by environment
 * variables, validated with zod, then frozen and passed to every component.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { isJsonObject, type JsonObject, type JsonValue } from './dialects/document.js';
import type { LogLevel } from './logger.js';

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

const ToolSchema = z
  .record(JsonValueSchema)
  .refine((tool) => typeof tool['type'] === 'string', {
    message: 'tool definition must have a string "type"',
  });

const RoutesSchema = z.object({
  chat: z.array(z.string().startsWith('/')).min(1),
  messages: z.array(z.string().startsWith('/')).min(1),
});

/**
 * Default caller → upstream model table for the Messages dialect.
 */
export const DEFAULT_MODEL_MAP: Readonly<Record<string, string>> = {
  'claude-opus-4-1-20250805': 'anthropic/claude-opus-4.1',
  'claude-opus-4-20250514': 'anthropic/claude-opus-4',
  'claude-sonnet-4-5-20250929': 'anthropic/claude-sonnet-4.5',
  'claude-sonnet-4-20250514': 'anthropic/claude-sonnet-4',
  'claude-3-7-sonnet-20250219': 'anthropic/claude-3.7-sonnet',
  'claude-3-5-haiku-20241022': 'anthropic/claude-3.5-haiku',
};

export const DEFAULT_WEB_SEARCH_TOOL: JsonObject = {
  type: 'web_search_20250305',
  name: 'web_search',
  max_uses: 5,
};

export const DEFAULT_ROUTES = {
  chat: ['/v1/chat/completions', '/chat/completions'],
  messages: ['/v1/messages', '/messages'],
};

const ConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(11731),
  host: z.string().min(1).default('0.0.0.0'),
  upstreamBaseUrl: z.string().url().default('https://zenmux.ai/api/v1'),
  anthropicBaseUrl: z.string().url().default('https://zenmux.ai/api/anthropic/v1'),
  proxyUrl: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  modelMap: z.record(z.string()).default({ ...DEFAULT_MODEL_MAP }),
  enableWebSearch: z.boolean().default(false),
  webSearchTool: ToolSchema.default({ ...DEFAULT_WEB_SEARCH_TOOL }),
  /** Ceiling for one upstream exchange; 0 means unbounded. */
  exchangeTimeoutMs: z.number().int().min(0).default(0),
  maxBodyBytes: z.number().int().positive().default(10 * 1024 * 1024),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  progress: z.boolean().default(false),
  routes: RoutesSchema.default(DEFAULT_ROUTES),
});

export type RelayConfigInput = z.input<typeof ConfigSchema>;

export interface RelayConfig {
  readonly port: number;
  readonly host: string;
  /** Base for the OpenAI dialect and for pass-through requests. */
  readonly upstreamBaseUrl: string;
  readonly anthropicBaseUrl: string;
  readonly proxyUrl?: string;
  readonly apiKey?: string;
  readonly modelMap: Readonly<Record<string, string>>;
  readonly enableWebSearch: boolean;
  readonly webSearchTool: Readonly<JsonObject>;
  readonly exchangeTimeoutMs: number;
  readonly maxBodyBytes: number;
  readonly logLevel: LogLevel;
  readonly progress: boolean;
  readonly routes: { readonly chat: readonly string[]; readonly messages: readonly string[] };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Validate and freeze a configuration. Missing fields take their defaults.
 */
export function resolveConfig(input?: RelayConfigInput): RelayConfig;
export function resolveConfig(input: unknown): RelayConfig;
export function resolveConfig(input: unknown = {}): RelayConfig {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config: ${detail}`, { cause: result.error });
  }
  const parsed = result.data;
  const config: RelayConfig = {
    ...parsed,
    upstreamBaseUrl: trimTrailingSlash(parsed.upstreamBaseUrl),
    anthropicBaseUrl: trimTrailingSlash(parsed.anthropicBaseUrl),
  };
  return deepFreeze(config);
}

function parseBoolean(name: string, value: string): boolean {
  const v = value.trim().toLowerCase();
  if (v === 'true' || v === '1' || v === 'yes' || v === 'on') return true;
  if (v === 'false' || v === '0' || v === 'no' || v === 'off' || v === '') return false;
  throw new ConfigError(`${name} must be a boolean, got "${value}"`);
}

function parseInteger(name: string, value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

function parseJson(name: string, value: string): unknown {
  try {
    return JSON.parse(value);
  } catch (err) {
    throw new ConfigError(`${name} is not valid JSON`, { cause: err });
  }
}

/**
 * Read configuration overrides from environment variables. Unset or empty
 * variables are skipped.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const read = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value === '' ? undefined : value;
  };

  const port = read('RELAY_PORT');
  if (port !== undefined) out['port'] = parseInteger('RELAY_PORT', port);
  const host = read('RELAY_HOST');
  if (host !== undefined) out['host'] = host;
  const base = read('UPSTREAM_BASE_URL');
  if (base !== undefined) out['upstreamBaseUrl'] = base;
  const anthropicBase = read('ANTHROPIC_BASE_URL');
  if (anthropicBase !== undefined) out['anthropicBaseUrl'] = anthropicBase;
  const proxy = read('UPSTREAM_PROXY_URL');
  if (proxy !== undefined) out['proxyUrl'] = proxy;
  const apiKey = read('UPSTREAM_API_KEY');
  if (apiKey !== undefined) out['apiKey'] = apiKey;
  const modelMap = read('ANTHROPIC_MODEL_MAP');
  if (modelMap !== undefined) out['modelMap'] = parseJson('ANTHROPIC_MODEL_MAP', modelMap);
  const webSearch = read('ENABLE_WEB_SEARCH');
  if (webSearch !== undefined) out['enableWebSearch'] = parseBoolean('ENABLE_WEB_SEARCH', webSearch);
  const tool = read('WEB_SEARCH_TOOL');
  if (tool !== undefined) out['webSearchTool'] = parseJson('WEB_SEARCH_TOOL', tool);
  const timeout = read('EXCHANGE_TIMEOUT_MS');
  if (timeout !== undefined) out['exchangeTimeoutMs'] = parseInteger('EXCHANGE_TIMEOUT_MS', timeout);
  const maxBody = read('MAX_BODY_BYTES');
  if (maxBody !== undefined) out['maxBodyBytes'] = parseInteger('MAX_BODY_BYTES', maxBody);
  const logLevel = read('RELAY_LOG_LEVEL');
  if (logLevel !== undefined) out['logLevel'] = logLevel;

  return out;
}

/**
 * Read a JSON config file. The file's shape is checked later by
 * {@link resolveConfig}.
 */
export function readConfigFile(configPath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Failed to read config file ${configPath}`, { cause: err });
  }
  const parsed = parseJson(configPath, raw);
  if (!isJsonObject(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  /** Applied last, e.g. CLI flags. */
  overrides?: Record<string, unknown>;
}

/**
 * Load configuration: file, then environment, then explicit overrides.
 */
export function loadConfig(opts: LoadConfigOptions = {}): RelayConfig {
  const fromFile = opts.configPath ? readConfigFile(opts.configPath) : {};
  const fromEnv = configFromEnv(opts.env ?? process.env);
  return resolveConfig({ ...fromFile, ...fromEnv, ...opts.overrides });
}

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  resolveConfig,
  configFromEnv,
  loadConfig,
  DEFAULT_MODEL_MAP,
  DEFAULT_WEB_SEARCH_TOOL,
} from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('resolveConfig', () => {
  it('fills in defaults', () => {
    const config = resolveConfig();
    expect(config.port).toBe(11731);
    expect(config.host).toBe('0.0.0.0');
    expect(config.upstreamBaseUrl).toBe('https://zenmux.ai/api/v1');
    expect(config.anthropicBaseUrl).toBe('https://zenmux.ai/api/anthropic/v1');
    expect(config.proxyUrl).toBeUndefined();
    expect(config.apiKey).toBeUndefined();
    expect(config.modelMap).toEqual(DEFAULT_MODEL_MAP);
    expect(config.enableWebSearch).toBe(false);
    expect(config.webSearchTool).toEqual(DEFAULT_WEB_SEARCH_TOOL);
    expect(config.exchangeTimeoutMs).toBe(0);
    expect(config.maxBodyBytes).toBe(10 * 1024 * 1024);
    expect(config.routes.chat).toEqual(['/v1/chat/completions', '/chat/completions']);
    expect(config.routes.messages).toEqual(['/v1/messages', '/messages']);
  });

  it('strips trailing slashes from base URLs', () => {
    const config = resolveConfig({ upstreamBaseUrl: 'http://gw.test/api/v1/', anthropicBaseUrl: 'http://gw.test/a//' });
    expect(config.upstreamBaseUrl).toBe('http://gw.test/api/v1');
    expect(config.anthropicBaseUrl).toBe('http://gw.test/a');
  });

  it('returns a deeply frozen value', () => {
    const config = resolveConfig({ modelMap: { a: 'b' } });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.modelMap)).toBe(true);
    expect(Object.isFrozen(config.routes.chat)).toBe(true);
    expect(Object.isFrozen(DEFAULT_MODEL_MAP)).toBe(false);
  });

  it('rejects invalid values with the offending path', () => {
    expect(() => resolveConfig({ port: 70000 })).toThrow(ConfigError);
    expect(() => resolveConfig({ upstreamBaseUrl: 'not a url' })).toThrow(/upstreamBaseUrl/);
    expect(() => resolveConfig({ modelMap: { a: 1 } })).toThrow(/modelMap\.a/);
    expect(() => resolveConfig({ webSearchTool: { name: 'no type' } })).toThrow(/string "type"/);
  });
});

describe('configFromEnv', () => {
  it('reads every supported variable', () => {
    const out = configFromEnv({
      RELAY_PORT: '8080',
      RELAY_HOST: '127.0.0.1',
      UPSTREAM_BASE_URL: 'http://gw.test/v1',
      ANTHROPIC_BASE_URL: 'http://gw.test/anthropic/v1',
      UPSTREAM_PROXY_URL: 'http://127.0.0.1:10809',
      UPSTREAM_API_KEY: 'test-secret',
      ANTHROPIC_MODEL_MAP: '{"claude-x":"anthropic/claude-x"}',
      ENABLE_WEB_SEARCH: 'yes',
      WEB_SEARCH_TOOL: '{"type":"web_search_20250305","max_uses":2}',
      EXCHANGE_TIMEOUT_MS: '600000',
      MAX_BODY_BYTES: '1024',
      RELAY_LOG_LEVEL: 'warn',
    });
    expect(out).toEqual({
      port: 8080,
      host: '127.0.0.1',
      upstreamBaseUrl: 'http://gw.test/v1',
      anthropicBaseUrl: 'http://gw.test/anthropic/v1',
      proxyUrl: 'http://127.0.0.1:10809',
      apiKey: 'test-secret',
      modelMap: { 'claude-x': 'anthropic/claude-x' },
      enableWebSearch: true,
      webSearchTool: { type: 'web_search_20250305', max_uses: 2 },
      exchangeTimeoutMs: 600000,
      maxBodyBytes: 1024,
      logLevel: 'warn',
    });
  });

  it('skips unset and empty variables', () => {
    expect(configFromEnv({ UPSTREAM_API_KEY: '', RELAY_HOST: undefined })).toEqual({});
  });

  it('rejects malformed values', () => {
    expect(() => configFromEnv({ RELAY_PORT: 'eighty' })).toThrow('RELAY_PORT must be a non-negative integer, got "eighty"');
    expect(() => configFromEnv({ ENABLE_WEB_SEARCH: 'maybe' })).toThrow('ENABLE_WEB_SEARCH must be a boolean, got "maybe"');
    expect(() => configFromEnv({ ANTHROPIC_MODEL_MAP: '{oops' })).toThrow('ANTHROPIC_MODEL_MAP is not valid JSON');
  });
});

describe('loadConfig', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  function writeConfig(contents: string): string {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-config-'));
    const file = path.join(dir, 'relay.json');
    fs.writeFileSync(file, contents);
    return file;
  }

  it('layers file, environment and overrides', () => {
    const configPath = writeConfig(JSON.stringify({ port: 9000, host: '127.0.0.1', enableWebSearch: true }));
    const config = loadConfig({
      configPath,
      env: { RELAY_PORT: '9100', UPSTREAM_API_KEY: 'test-secret' },
      overrides: { port: 9200 },
    });
    expect(config.port).toBe(9200);
    expect(config.host).toBe('127.0.0.1');
    expect(config.enableWebSearch).toBe(true);
    expect(config.apiKey).toBe('test-secret');
  });

  it('fails on a config file that is not an object', () => {
    const configPath = writeConfig('[1, 2, 3]');
    expect(() => loadConfig({ configPath, env: {} })).toThrow(/must contain a JSON object/);
  });

  it('fails on a missing config file', () => {
    expect(() => loadConfig({ configPath: '/nonexistent/relay.json', env: {} })).toThrow(
      'Failed to read config file /nonexistent/relay.json'
    );
  });
});

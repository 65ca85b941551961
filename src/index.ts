/**
 * llm-dialect-relay
 *
 * Streaming reverse proxy that takes OpenAI-style Chat Completions and
 * Anthropic-style Messages requests from local clients and forwards them to
 * one LLM gateway.
 *
 * @example
 * ```typescript
 * import { loadConfig, startRelay } from 'llm-dialect-relay';
 *
 * const relay = await startRelay({ config: loadConfig({ overrides: { port: 11731 } }) });
 * ```
 *
 * @packageDocumentation
 */

// Server
export { RelayServer, startRelay, requestUrl } from './server.js';
export type { RelayServerOptions } from './server.js';

// Configuration
export {
  loadConfig,
  resolveConfig,
  configFromEnv,
  readConfigFile,
  DEFAULT_MODEL_MAP,
  DEFAULT_WEB_SEARCH_TOOL,
  DEFAULT_ROUTES,
} from './config.js';
export type { RelayConfig, RelayConfigInput, LoadConfigOptions } from './config.js';

// Pipeline
export { HeaderMap, sanitizeHeaders, STRIPPED_REQUEST_HEADERS, STRIPPED_RESPONSE_HEADERS } from './headers.js';
export type { Dialect, SanitizeOptions } from './headers.js';
export * from './dialects/index.js';
export { UpstreamDispatcher, UpstreamConnection, decodeBody } from './upstream.js';
export type {
  DispatchOptions,
  OutboundRequest,
  BufferedResponse,
  StreamingExchange,
  DispatcherOptions,
  ConnectionEvent,
  ConnectionClosedEvent,
} from './upstream.js';
export { relayChunks, pipeRelay, createSession } from './relay.js';
export type { RelaySession, RelayOutcome, RelayOptions, Closable } from './relay.js';
export { matchRoute, passthroughTarget, chatTarget, messagesTarget, PASSTHROUGH_METHODS } from './router.js';
export type { RouteKind, RouteMatch, RouteTable } from './router.js';

// Errors
export {
  ModelNotMappedError,
  ConnectionError,
  UpstreamTimeoutError,
  BodyTooLargeError,
  ConfigError,
  errorMessage,
} from './errors.js';

// Observability
export { StatsCollector, formatStats } from './stats.js';
export type { ExchangeRecord, ExchangeOutcome, StatsSnapshot, StatsOptions } from './stats.js';
export { ProgressLine, formatProgress } from './progress.js';
export type { ProgressSink } from './progress.js';
export { createLogger, defaultLogger, silentLogger, describeError } from './logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';

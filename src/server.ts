/**
 * Relay Server
 *
 * `node:http` front end that wires the pipeline for every inbound request:
 *
 * - `POST /v1/chat/completions`, `/chat/completions`: usage flag injection,
 *   always streamed back as `text/event-stream`
 * - `POST /v1/messages`, `/messages`: model remapping and tool injection,
 *   streamed or buffered following the body's `stream` field
 * - anything else: forwarded unchanged, buffered
 *
 * @packageDocumentation
 */

import * as http from 'node:http';
import type { AddressInfo } from 'node:net';
import { BodyTooLargeError, ModelNotMappedError, errorMessage } from './errors.js';
import { HeaderMap, sanitizeHeaders, type Dialect } from './headers.js';
import { parseDocument, type JsonObject } from './dialects/document.js';
import { transformChatBody } from './dialects/openai.js';
import { MODEL_MAP_NAME, transformMessagesBody } from './dialects/anthropic.js';
import { UpstreamDispatcher, type BufferedResponse, type StreamingExchange } from './upstream.js';
import { createSession, pipeRelay, type RelaySession } from './relay.js';
import {
  chatTarget,
  matchRoute,
  messagesTarget,
  passthroughTarget,
  type RouteKind,
} from './router.js';
import { StatsCollector, type ExchangeOutcome } from './stats.js';
import type { ProgressSink } from './progress.js';
import type { RelayConfig } from './config.js';
import { type Logger, defaultLogger, describeError } from './logger.js';

export interface RelayServerOptions {
  config: RelayConfig;
  logger?: Logger;
  dispatcher?: UpstreamDispatcher;
  stats?: StatsCollector;
  /** Live progress line for streamed chat completions. */
  progress?: ProgressSink | null;
}

async function readRequestBody(req: http.IncomingMessage, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;
  // Drained to the end even past the limit, so the socket survives for the 413.
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size <= limit) chunks.push(buf);
  }
  if (size > limit) {
    throw new BodyTooLargeError(limit);
  }
  return Buffer.concat(chunks);
}

/**
 * Parse the request target. The raw path is appended to a fixed origin so a
 * target starting with `//` stays a path instead of naming a host.
 */
export function requestUrl(target: string | undefined): URL {
  const raw = target ?? '/';
  return raw.startsWith('/') ? new URL(`http://relay.invalid${raw}`) : new URL(raw, 'http://relay.invalid');
}

function sendJson(res: http.ServerResponse, status: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(body);
}

function sendText(res: http.ServerResponse, status: number, text: string): void {
  res.writeHead(status, {
    'Content-Type': 'text/plain; charset=utf-8',
    'Content-Length': Buffer.byteLength(text),
  });
  res.end(text);
}

function sendBuffered(res: http.ServerResponse, upstream: BufferedResponse): void {
  res.writeHead(upstream.status, upstream.headers.toOutgoing());
  res.end(upstream.body);
}

export class RelayServer {
  readonly config: RelayConfig;
  readonly dispatcher: UpstreamDispatcher;
  readonly stats: StatsCollector;
  private readonly logger: Logger;
  private readonly progress: ProgressSink | null;
  private server: http.Server | null = null;

  constructor(opts: RelayServerOptions) {
    this.config = opts.config;
    this.logger = opts.logger ?? defaultLogger;
    this.dispatcher =
      opts.dispatcher ??
      new UpstreamDispatcher({
        proxyUrl: this.config.proxyUrl,
        exchangeTimeoutMs: this.config.exchangeTimeoutMs,
        logger: this.logger,
      });
    this.stats = opts.stats ?? new StatsCollector();
    this.progress = opts.progress ?? null;
  }

  /**
   * Request listener, usable with any `http.Server`.
   */
  readonly listener: http.RequestListener = (req, res) => {
    this.handle(req, res).catch((err: unknown) => {
      this.logger.error(`Unhandled relay error: ${describeError(err)}`);
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'Internal relay error' });
      } else {
        res.destroy();
      }
    });
  };

  async start(): Promise<AddressInfo> {
    if (this.server) throw new Error('Relay server already started');
    const server = http.createServer(this.listener);
    this.server = server;
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Relay server is not listening on a TCP port');
    }
    return address;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const caller = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) caller.abort();
    };
    res.on('close', onClose);
    try {
      await this.route(req, res, caller.signal);
    } finally {
      res.off('close', onClose);
    }
  }

  private async route(req: http.IncomingMessage, res: http.ServerResponse, signal: AbortSignal): Promise<void> {
    const startTime = Date.now();
    const method = req.method ?? 'GET';
    const url = requestUrl(req.url);
    const match = matchRoute(method, url.pathname, this.config.routes);

    if (match.kind === 'method-not-allowed') {
      sendJson(res, 405, { error: 'Method not allowed' });
      return;
    }

    let raw: Buffer;
    try {
      raw = await readRequestBody(req, this.config.maxBodyBytes);
    } catch (err) {
      this.logger.warn(`[${match.kind}] failed to read request body: ${describeError(err)}`);
      if (err instanceof BodyTooLargeError) {
        sendJson(res, 413, { error: 'Request body too large' });
      } else {
        sendJson(res, 400, { error: 'Invalid request body' });
      }
      this.record(match.kind, startTime, res.statusCode, 'rejected');
      return;
    }

    switch (match.kind) {
      case 'chat':
        await this.handleChat(req, res, raw, startTime, signal);
        return;
      case 'messages':
        await this.handleMessages(req, res, raw, startTime, signal);
        return;
      case 'passthrough':
        await this.handlePassthrough(req, res, url, raw, startTime, signal);
        return;
    }
  }

  private outboundHeaders(req: http.IncomingMessage, dialect: Dialect): HeaderMap {
    return sanitizeHeaders(HeaderMap.fromIncoming(req.headers), {
      credential: this.config.apiKey,
      dialect,
    });
  }

  private async handleChat(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    raw: Buffer,
    startTime: number,
    signal: AbortSignal
  ): Promise<void> {
    const document = parseDocument(raw);
    const model = typeof document['model'] === 'string' ? document['model'] : 'unknown';
    this.logger.info(`[chat] request → ${model}`);

    const { body, injectedUsage } = transformChatBody(document);
    if (injectedUsage) {
      this.logger.info('[chat] injected stream_options.include_usage');
    }

    let exchange: StreamingExchange;
    try {
      exchange = await this.dispatcher.dispatch(
        {
          method: 'POST',
          url: chatTarget(this.config.upstreamBaseUrl),
          headers: this.outboundHeaders(req, 'openai'),
          body: { kind: 'document', document: body },
        },
        { streaming: true, signal }
      );
    } catch (err) {
      if (signal.aborted) {
        this.cancelled('chat', startTime);
        return;
      }
      this.logger.error(`[chat] connection failed: ${describeError(err)}`);
      sendText(res, 502, `Connection Error: ${errorMessage(err)}`);
      this.record('chat', startTime, 502, 'connection-error');
      return;
    }

    await this.relay('chat', model, exchange, res, startTime, signal);
  }

  private async handleMessages(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    raw: Buffer,
    startTime: number,
    signal: AbortSignal
  ): Promise<void> {
    const document = parseDocument(raw);

    let body: JsonObject;
    let label: string;
    try {
      const result = transformMessagesBody(document, {
        modelMap: this.config.modelMap,
        modelMapName: MODEL_MAP_NAME,
        enableWebSearch: this.config.enableWebSearch,
        webSearchTool: this.config.webSearchTool,
      });
      body = result.body;
      label = result.upstreamModel;
      this.logger.info(`[messages] request ${result.originalModel} → ${result.upstreamModel}`);
      if (result.injectedTool) {
        this.logger.info(`[messages] injected tool ${String(this.config.webSearchTool['type'])}`);
      }
    } catch (err) {
      if (!(err instanceof ModelNotMappedError)) throw err;
      this.logger.warn(`[messages] rejected: ${err.message}`);
      sendJson(res, 400, { error: err.message });
      this.record('messages', startTime, 400, 'rejected');
      return;
    }

    const streaming = body['stream'] === true;
    let upstream: StreamingExchange | BufferedResponse;
    try {
      upstream = await this.dispatcher.dispatch(
        {
          method: 'POST',
          url: messagesTarget(this.config.anthropicBaseUrl),
          headers: this.outboundHeaders(req, 'anthropic'),
          body: { kind: 'document', document: body },
        },
        { streaming, signal }
      );
    } catch (err) {
      if (signal.aborted) {
        this.cancelled('messages', startTime);
        return;
      }
      this.logger.error(`[messages] connection failed: ${describeError(err)}`);
      sendText(res, 502, `Connection Error: ${errorMessage(err)}`);
      this.record('messages', startTime, 502, 'connection-error');
      return;
    }

    if (upstream.mode === 'streaming') {
      await this.relay('messages', label, upstream, res, startTime, signal);
      return;
    }

    sendBuffered(res, upstream);
    this.logger.info(`[messages] ${label} ← ${upstream.status} (${Date.now() - startTime}ms)`);
    this.record('messages', startTime, upstream.status, 'completed', {
      chunks: 0,
      bytes: upstream.body.length,
    });
  }

  private async handlePassthrough(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    url: URL,
    raw: Buffer,
    startTime: number,
    signal: AbortSignal
  ): Promise<void> {
    const method = req.method ?? 'GET';
    const target = passthroughTarget(this.config.upstreamBaseUrl, url.pathname, url.search);
    this.logger.info(`[proxy] ${method} ${url.pathname} → ${target.pathname}`);

    let upstream: BufferedResponse;
    try {
      upstream = await this.dispatcher.dispatch(
        {
          method,
          url: target,
          headers: this.outboundHeaders(req, 'openai'),
          body: raw.length > 0 ? { kind: 'opaque', bytes: raw } : null,
        },
        { streaming: false, signal }
      );
    } catch (err) {
      if (signal.aborted) {
        this.cancelled('passthrough', startTime);
        return;
      }
      this.logger.error(`[proxy] ${method} ${url.pathname} failed: ${describeError(err)}`);
      sendText(res, 502, `Proxy Error: ${errorMessage(err)}`);
      this.record('passthrough', startTime, 502, 'connection-error');
      return;
    }

    sendBuffered(res, upstream);
    this.logger.info(`[proxy] ${method} ${url.pathname} ← ${upstream.status} (${Date.now() - startTime}ms)`);
    this.record('passthrough', startTime, upstream.status, 'completed', {
      chunks: 0,
      bytes: upstream.body.length,
    });
  }

  private async relay(
    route: 'chat' | 'messages',
    label: string,
    exchange: StreamingExchange,
    res: http.ServerResponse,
    startTime: number,
    signal: AbortSignal
  ): Promise<void> {
    if (!signal.aborted) {
      res.writeHead(exchange.status, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
      });
    }

    const progress = route === 'chat' ? this.progress : null;
    const session: RelaySession = createSession(exchange.connection.id);
    await pipeRelay(exchange, res, {
      session,
      signal,
      onChunk: progress ? (_chunk, s) => progress.update(label, s) : undefined,
    });
    progress?.finish();

    const durationMs = Date.now() - startTime;
    switch (session.outcome) {
      case 'failed':
        this.logger.error(`[${route}] stream interrupted after ${session.chunks} chunks: ${session.error ?? 'unknown error'}`);
        break;
      case 'cancelled':
        this.logger.warn(`[${route}] caller disconnected after ${session.chunks} chunks`);
        break;
      default:
        this.logger.info(
          `[${route}] done: ${label} | chunks: ${session.chunks} | ${(session.bytes / 1024).toFixed(1)}KB | ${durationMs}ms`
        );
    }

    this.record(route, startTime, exchange.status, session.outcome ?? 'completed', {
      chunks: session.chunks,
      bytes: session.bytes,
    });
  }

  private cancelled(route: RouteKind, startTime: number): void {
    this.logger.warn(`[${route}] caller disconnected before the upstream answered`);
    this.record(route, startTime, 499, 'cancelled');
  }

  private record(
    route: RouteKind,
    startTime: number,
    status: number,
    outcome: ExchangeOutcome,
    volume: { chunks: number; bytes: number } = { chunks: 0, bytes: 0 }
  ): void {
    this.stats.record({
      timestamp: startTime,
      route,
      status,
      latencyMs: Date.now() - startTime,
      outcome,
      ...volume,
    });
  }
}

/**
 * Create and start a relay server.
 *
 * @example
 * ```typescript
 * import { loadConfig, startRelay } from 'llm-dialect-relay';
 *
 * const relay = await startRelay({ config: loadConfig() });
 * ```
 */
export async function startRelay(opts: RelayServerOptions): Promise<RelayServer> {
  const server = new RelayServer(opts);
  await server.start();
  return server;
}

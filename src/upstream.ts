/**
 * Upstream Dispatcher
 *
 * Sends one outbound request per exchange over a private agent (tunneled
 * through a forward proxy when one is configured) and owns the resulting
 * connection until it is either closed here (buffered mode, failures) or
 * handed to the stream relay (streaming mode).
 *
 * @packageDocumentation
 */

import * as http from 'node:http';
import * as https from 'node:https';
import * as zlib from 'node:zlib';
import { EventEmitter } from 'node:events';
import { promisify } from 'node:util';
import { HttpProxyAgent } from 'http-proxy-agent';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { nanoid } from 'nanoid';
import { ConnectionError, UpstreamTimeoutError } from './errors.js';
import { HeaderMap, STRIPPED_RESPONSE_HEADERS } from './headers.js';
import { encodeBody, type RequestBody } from './dialects/document.js';
import { type Logger, defaultLogger, describeError } from './logger.js';

export interface OutboundRequest {
  method: string;
  url: URL;
  headers: HeaderMap;
  body: RequestBody | null;
}

export interface BufferedResponse {
  mode: 'buffered';
  status: number;
  headers: HeaderMap;
  body: Buffer;
}

export interface StreamingExchange {
  mode: 'streaming';
  status: number;
  headers: HeaderMap;
  body: http.IncomingMessage;
  /** Now owned by the caller, which must close it. */
  connection: UpstreamConnection;
}

export interface ConnectionEvent {
  id: string;
  url: string;
}

export interface ConnectionClosedEvent extends ConnectionEvent {
  durationMs: number;
}

export interface DispatchOptions {
  streaming: boolean;
  /** Aborting before response headers arrive closes the connection. */
  signal?: AbortSignal;
}

export interface DispatcherOptions {
  /** Forward proxy, e.g. `http://127.0.0.1:10809`. */
  proxyUrl?: string;
  /** Ceiling for a whole exchange, headers through last byte. 0 disables it. */
  exchangeTimeoutMs?: number;
  logger?: Logger;
}

/**
 * One outbound HTTP exchange and the agent carrying it. Releasing it tears
 * down the request, the response and the agent's sockets.
 */
export class UpstreamConnection {
  readonly id: string;
  readonly url: URL;
  readonly openedAt = Date.now();
  private closed = false;
  private request: http.ClientRequest | null = null;
  private response: http.IncomingMessage | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private failPending: ((err: Error) => void) | null = null;

  constructor(
    private readonly agent: http.Agent,
    url: URL,
    private readonly onClose: (conn: UpstreamConnection) => void,
    timeoutMs: number
  ) {
    this.id = nanoid(10);
    this.url = url;
    if (timeoutMs > 0) {
      this.timer = setTimeout(() => this.abort(new UpstreamTimeoutError(timeoutMs)), timeoutMs);
      this.timer.unref();
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Send the request and resolve once response headers arrive.
   */
  send(outbound: OutboundRequest, logger: Logger): Promise<http.IncomingMessage> {
    if (this.closed) {
      return Promise.reject(new Error('Upstream connection closed'));
    }
    const payload = outbound.body ? encodeBody(outbound.body) : null;
    const headers = outbound.headers.without([]);
    if (payload) {
      headers.set('content-length', String(payload.length));
      if (outbound.body?.kind === 'document' && !headers.has('content-type')) {
        headers.set('content-type', 'application/json');
      }
    }

    const requestFn = outbound.url.protocol === 'https:' ? https.request : http.request;

    return new Promise((resolve, reject) => {
      let settled = false;
      this.failPending = (err) => {
        if (settled) return;
        settled = true;
        reject(err);
      };
      const req = requestFn(outbound.url, {
        method: outbound.method,
        headers: headers.toOutgoing(),
        agent: this.agent,
      });
      this.request = req;

      req.on('response', (res) => {
        this.response = res;
        // The relay reports read failures; this keeps a late error from going unhandled.
        res.on('error', (err) => logger.debug(`[${this.id}] upstream response error: ${describeError(err)}`));
        settled = true;
        resolve(res);
      });
      req.on('error', (err) => {
        if (!settled) {
          settled = true;
          reject(err);
          return;
        }
        logger.debug(`[${this.id}] upstream request error: ${describeError(err)}`);
      });

      req.end(payload ?? undefined);
    });
  }

  /** Destroy the exchange with an error; the owner still has to close it. */
  private abort(err: Error): void {
    if (this.closed) return;
    this.response?.destroy(err);
    this.request?.destroy(err);
  }

  /**
   * Release the connection. Returns false when it was already released.
   */
  close(): boolean {
    if (this.closed) return false;
    this.closed = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.failPending?.(new Error('Upstream connection closed'));
    this.failPending = null;
    this.response?.destroy();
    this.request?.destroy();
    this.agent.destroy();
    this.onClose(this);
    return true;
  }
}

const gunzip = promisify(zlib.gunzip);
const inflate = promisify(zlib.inflate);
const brotliDecompress = promisify(zlib.brotliDecompress);

/**
 * Undo the upstream's content-encoding so the body can be replayed without it.
 */
export async function decodeBody(raw: Buffer, encoding: string | undefined): Promise<Buffer> {
  switch (encoding?.trim().toLowerCase()) {
    case 'gzip':
    case 'x-gzip':
      return gunzip(raw);
    case 'deflate':
      return inflate(raw);
    case 'br':
      return brotliDecompress(raw);
    default:
      return raw;
  }
}

export class UpstreamDispatcher extends EventEmitter {
  private readonly proxyUrl: string | undefined;
  private readonly exchangeTimeoutMs: number;
  private readonly logger: Logger;
  private readonly active = new Set<UpstreamConnection>();

  constructor(opts: DispatcherOptions = {}) {
    super();
    this.proxyUrl = opts.proxyUrl;
    this.exchangeTimeoutMs = opts.exchangeTimeoutMs ?? 0;
    this.logger = opts.logger ?? defaultLogger;
  }

  /** Connections opened and not yet closed. */
  get activeConnections(): number {
    return this.active.size;
  }

  dispatch(outbound: OutboundRequest, opts: DispatchOptions & { streaming: true }): Promise<StreamingExchange>;
  dispatch(outbound: OutboundRequest, opts: DispatchOptions & { streaming: false }): Promise<BufferedResponse>;
  dispatch(outbound: OutboundRequest, opts: DispatchOptions): Promise<StreamingExchange | BufferedResponse>;
  async dispatch(
    outbound: OutboundRequest,
    opts: DispatchOptions
  ): Promise<StreamingExchange | BufferedResponse> {
    const { connection, response } = await this.open(outbound, opts.signal);

    if (opts.streaming) {
      return {
        mode: 'streaming',
        status: response.statusCode ?? 502,
        headers: HeaderMap.fromIncoming(response.headers),
        body: response,
        connection,
      };
    }

    const cancel = () => {
      connection.close();
    };
    opts.signal?.addEventListener('abort', cancel, { once: true });

    try {
      const chunks: Buffer[] = [];
      for await (const chunk of response) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
      const body = await decodeBody(Buffer.concat(chunks), response.headers['content-encoding']);
      return {
        mode: 'buffered',
        status: response.statusCode ?? 502,
        headers: HeaderMap.fromIncoming(response.headers).without(STRIPPED_RESPONSE_HEADERS),
        body,
      };
    } catch (err) {
      throw new ConnectionError(err);
    } finally {
      opts.signal?.removeEventListener('abort', cancel);
      connection.close();
    }
  }

  private async open(
    outbound: OutboundRequest,
    signal: AbortSignal | undefined
  ): Promise<{ connection: UpstreamConnection; response: http.IncomingMessage }> {
    const connection = new UpstreamConnection(
      this.createAgent(outbound.url),
      outbound.url,
      (conn) => this.released(conn),
      this.exchangeTimeoutMs
    );
    this.active.add(connection);
    this.emit('open', { id: connection.id, url: outbound.url.toString() } satisfies ConnectionEvent);

    // Until response headers arrive the dispatcher owns the connection, so
    // it also answers the caller going away.
    const cancel = () => {
      connection.close();
    };
    signal?.addEventListener('abort', cancel, { once: true });
    if (signal?.aborted) cancel();

    try {
      const response = await connection.send(outbound, this.logger);
      return { connection, response };
    } catch (err) {
      connection.close();
      throw new ConnectionError(err);
    } finally {
      signal?.removeEventListener('abort', cancel);
    }
  }

  private createAgent(target: URL): http.Agent {
    const secure = target.protocol === 'https:';
    if (this.proxyUrl) {
      return secure ? new HttpsProxyAgent(this.proxyUrl) : new HttpProxyAgent(this.proxyUrl);
    }
    return secure ? new https.Agent({ keepAlive: false }) : new http.Agent({ keepAlive: false });
  }

  private released(conn: UpstreamConnection): void {
    this.active.delete(conn);
    this.emit('close', {
      id: conn.id,
      url: conn.url.toString(),
      durationMs: Date.now() - conn.openedAt,
    } satisfies ConnectionClosedEvent);
  }
}

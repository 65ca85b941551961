/**
 * Stream Relay
 *
 * Copies an upstream byte stream to the caller chunk for chunk. The
 * upstream connection is released in exactly one place, the generator's
 * `finally`, which runs on normal end, on a read failure and when the
 * consumer stops early or the caller goes away.
 *
 * @packageDocumentation
 */

import type * as http from 'node:http';
import { once } from 'node:events';
import { errorMessage } from './errors.js';
import { describeError } from './logger.js';
import type { StreamingExchange } from './upstream.js';

export type RelayOutcome = 'completed' | 'failed' | 'cancelled';

export interface RelaySession {
  id: string;
  startedAt: number;
  chunks: number;
  bytes: number;
  outcome?: RelayOutcome;
  /** Error kind and message when the upstream read failed. */
  error?: string;
}

/** Anything the relay can release once it is done with the stream. */
export interface Closable {
  close(): unknown;
}

export interface RelayOptions {
  session?: RelaySession;
  /** Aborting releases the connection at once. */
  signal?: AbortSignal;
  onChunk?: (chunk: Buffer, session: RelaySession) => void;
}

export function createSession(id: string): RelaySession {
  return { id, startedAt: Date.now(), chunks: 0, bytes: 0 };
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  return Buffer.from(String(chunk), 'utf-8');
}

/**
 * Yield every chunk read from `source`, unchanged and in order, then close
 * `connection`. A read failure yields one final chunk holding the error
 * message before the connection is closed.
 */
export async function* relayChunks(
  source: AsyncIterable<unknown>,
  connection: Closable,
  opts: RelayOptions = {}
): AsyncGenerator<Buffer, RelaySession, undefined> {
  const session = opts.session ?? createSession('relay');
  const { signal } = opts;
  let released = false;
  const release = () => {
    if (released) return;
    released = true;
    connection.close();
  };
  signal?.addEventListener('abort', release, { once: true });

  try {
    if (signal?.aborted) {
      session.outcome = 'cancelled';
      return session;
    }
    for await (const raw of source) {
      const chunk = toBuffer(raw);
      session.chunks++;
      session.bytes += chunk.length;
      opts.onChunk?.(chunk, session);
      yield chunk;
    }
    session.outcome = 'completed';
  } catch (err) {
    if (signal?.aborted) {
      session.outcome = 'cancelled';
    } else {
      session.outcome = 'failed';
      session.error = describeError(err);
      yield Buffer.from(errorMessage(err), 'utf-8');
    }
  } finally {
    signal?.removeEventListener('abort', release);
    session.outcome ??= 'cancelled';
    release();
  }
  return session;
}

export interface PipeOptions {
  session: RelaySession;
  /** Caller-gone signal raised before the relay started. */
  signal?: AbortSignal;
  onChunk?: (chunk: Buffer, session: RelaySession) => void;
}

/**
 * Relay a streaming exchange into a server response that already has its
 * status line written. Ends the response and resolves with the session
 * once the upstream connection is released.
 */
export async function pipeRelay(
  exchange: StreamingExchange,
  res: http.ServerResponse,
  opts: PipeOptions
): Promise<RelaySession> {
  const controller = new AbortController();
  const onClose = () => {
    if (!res.writableEnded) controller.abort();
  };
  const onAbort = () => controller.abort();
  res.on('close', onClose);
  opts.signal?.addEventListener('abort', onAbort, { once: true });
  // A caller that left before now has already fired 'close'.
  if (opts.signal?.aborted || res.destroyed || res.socket?.destroyed) {
    controller.abort();
  }

  const chunks = relayChunks(exchange.body, exchange.connection, {
    session: opts.session,
    signal: controller.signal,
    onChunk: opts.onChunk,
  });

  try {
    for (;;) {
      const next = await chunks.next();
      if (next.done) break;
      if (controller.signal.aborted) continue;
      if (!res.write(next.value)) {
        await once(res, 'drain', { signal: controller.signal });
      }
    }
  } catch (err) {
    await chunks.return(opts.session);
    if (!controller.signal.aborted) throw err;
  } finally {
    res.off('close', onClose);
    opts.signal?.removeEventListener('abort', onAbort);
  }

  if (!res.writableEnded && !controller.signal.aborted) {
    res.end();
  }
  return opts.session;
}

/**
 * Stats Collector
 *
 * Keeps a rolling 1-hour record of finished exchanges.
 *
 * @packageDocumentation
 */

import type { RouteKind } from './router.js';
import type { RelayOutcome } from './relay.js';

export type ExchangeOutcome = RelayOutcome | 'rejected' | 'connection-error';

export interface ExchangeRecord {
  timestamp: number;
  route: RouteKind;
  status: number;
  latencyMs: number;
  outcome: ExchangeOutcome;
  chunks: number;
  bytes: number;
}

export interface StatsSnapshot {
  totalExchanges: number;
  byRoute: Record<RouteKind, number>;
  byOutcome: Record<ExchangeOutcome, number>;
  streamedChunks: number;
  streamedBytes: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  p99LatencyMs: number;
}

export interface StatsOptions {
  /** How long a finished exchange counts toward the snapshot. Defaults to an hour. */
  windowMs?: number;
}

export class StatsCollector {
  private records: ExchangeRecord[] = [];
  private readonly windowMs: number;

  constructor(opts: StatsOptions = {}) {
    this.windowMs = opts.windowMs ?? 60 * 60 * 1000;
  }

  record(entry: ExchangeRecord): void {
    this.records.push(entry);
    this.prune();
  }

  getStats(): StatsSnapshot {
    this.prune();
    const recs = this.records;
    const byRoute: Record<RouteKind, number> = { chat: 0, messages: 0, passthrough: 0 };
    const byOutcome: Record<ExchangeOutcome, number> = {
      completed: 0,
      failed: 0,
      cancelled: 0,
      rejected: 0,
      'connection-error': 0,
    };
    let streamedChunks = 0;
    let streamedBytes = 0;
    for (const r of recs) {
      byRoute[r.route]++;
      byOutcome[r.outcome]++;
      streamedChunks += r.chunks;
      streamedBytes += r.bytes;
    }

    const latencies = recs.map(r => r.latencyMs).sort((a, b) => a - b);
    const rank = nearestRank(latencies);

    return {
      totalExchanges: recs.length,
      byRoute,
      byOutcome,
      streamedChunks,
      streamedBytes,
      avgLatencyMs: latencies.length ? Math.round(latencies.reduce((a, b) => a + b, 0) / latencies.length) : 0,
      p50LatencyMs: rank(50),
      p95LatencyMs: rank(95),
      p99LatencyMs: rank(99),
    };
  }

  private prune(): void {
    const cutoff = Date.now() - this.windowMs;
    this.records = this.records.filter(r => r.timestamp >= cutoff);
  }
}

/** Nearest-rank percentile lookup over ascending latencies; 0 when empty. */
function nearestRank(sorted: readonly number[]): (pct: number) => number {
  return (pct) => {
    const rank = Math.max(1, Math.ceil((pct / 100) * sorted.length));
    return sorted[rank - 1] ?? 0;
  };
}

export function formatStats(s: StatsSnapshot): string {
  return [
    `exchanges: ${s.totalExchanges} (chat ${s.byRoute.chat}, messages ${s.byRoute.messages}, passthrough ${s.byRoute.passthrough})`,
    `outcomes: completed ${s.byOutcome.completed}, failed ${s.byOutcome.failed}, cancelled ${s.byOutcome.cancelled}, rejected ${s.byOutcome.rejected}, connection errors ${s.byOutcome['connection-error']}`,
    `streamed: ${s.streamedChunks} chunks, ${(s.streamedBytes / 1024).toFixed(1)}KB`,
    `latency: avg ${s.avgLatencyMs}ms, p50 ${s.p50LatencyMs}ms, p95 ${s.p95LatencyMs}ms, p99 ${s.p99LatencyMs}ms`,
  ].join('\n');
}

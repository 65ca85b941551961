/**
 * Single-line live progress for streaming exchanges, redrawn in place on a
 * TTY.
 * @packageDocumentation
 */

import type { RelaySession } from './relay.js';

const SPINNER = '⠋⠙⠹⠸⠼⠴⠦⠧⠇⠏';

export function formatProgress(label: string, session: RelaySession, now: Date = new Date()): string {
  const frame = SPINNER[session.chunks % SPINNER.length] ?? '';
  const kb = (session.bytes / 1024).toFixed(1);
  const clock = now.toTimeString().slice(0, 8);
  return `${frame} ${label} | chunks: ${session.chunks} | ${kb}KB | ${clock}`;
}

export interface ProgressSink {
  update(label: string, session: RelaySession): void;
  finish(): void;
}

export class ProgressLine implements ProgressSink {
  private dirty = false;

  constructor(private readonly stream: NodeJS.WritableStream = process.stderr) {}

  update(label: string, session: RelaySession): void {
    this.stream.write(`\r\x1b[K${formatProgress(label, session)}`);
    this.dirty = true;
  }

  finish(): void {
    if (!this.dirty) return;
    this.stream.write('\n');
    this.dirty = false;
  }
}

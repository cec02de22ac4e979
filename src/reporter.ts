/**
 * docschema Console Reporter — prints `log` events
 *
 * Format: `2024-05-01 13:37:00 - INFO - message`. Warnings and errors go to
 * stderr. Returns a function that detaches the reporter.
 */

import type { DocSchemaEventEmitter, DocSchemaListener } from './events.js';
import type { DocSchemaEvents } from './types.js';

export interface ReporterStreams {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleStreams: ReporterStreams = {
  out: line => console.log(line),
  err: line => console.error(line),
};

export function formatLogLine(event: DocSchemaEvents['log']): string {
  return `${formatTimestamp(event.timestamp)} - ${event.level.toUpperCase()} - ${event.message}`;
}

export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function attachConsoleReporter(
  emitter: DocSchemaEventEmitter,
  streams: ReporterStreams = consoleStreams,
): () => void {
  const listener: DocSchemaListener<'log'> = event => {
    const line = formatLogLine(event);
    if (event.level === 'warn' || event.level === 'error') streams.err(line);
    else streams.out(line);
  };
  return emitter.subscribe('log', listener);
}

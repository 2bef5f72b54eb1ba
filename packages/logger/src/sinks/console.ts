import pc from 'picocolors';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface LineWriter {
  write(chunk: string): unknown;
}

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean | undefined;
  /** Destination stream. Defaults to stderr so stdout stays free for the snapshot. */
  stream?: LineWriter | undefined;
}

const levelColors: Record<LogLevel, (text: string) => string> = {
  trace: pc.gray,
  debug: pc.cyan,
  info: pc.green,
  warn: pc.yellow,
  error: pc.red,
};

/**
 * Human-readable diagnostics.
 *
 * Format: [HH:MM:SS] LEVEL [category] message {key=value, ...}
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;
  private readonly stream: LineWriter;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
    this.stream = options?.stream ?? process.stderr;
  }

  protected writeEntry(entry: LogEntry): void {
    const time = formatTime(entry.timestamp);
    const level = this.formatLevel(entry.level);
    const context = entry.context ? ` ${formatContext(entry.context)}` : '';

    this.stream.write(`${time} ${level} [${entry.category}] ${entry.msg}${context}\n`);
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    return this.color ? levelColors[level](upper) : upper;
  }
}

function formatTime(timestamp: Date): string {
  const hours = String(timestamp.getHours()).padStart(2, '0');
  const minutes = String(timestamp.getMinutes()).padStart(2, '0');
  const seconds = String(timestamp.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

function formatContext(context: Record<string, unknown>): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return `{${pairs.join(', ')}}`;
}

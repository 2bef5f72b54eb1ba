import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';

export interface FileSinkOptions extends BufferedSinkOptions {
  path: string;
}

/**
 * Appends one JSON object per entry, so a run's rejections can be audited with
 * line-oriented tools after the fact.
 */
export class FileSink extends BufferedSink {
  private readonly path: string;

  constructor(options: FileSinkOptions) {
    super(options);
    mkdirSync(dirname(options.path), { recursive: true });
    this.path = options.path;
  }

  protected writeEntry(entry: LogEntry): void {
    const line = JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      msg: entry.msg,
      ...(entry.context ? { context: entry.context } : {}),
    });
    // Synchronous on purpose: flushLoggers() runs right before process exit
    appendFileSync(this.path, `${line}\n`, 'utf8');
  }
}

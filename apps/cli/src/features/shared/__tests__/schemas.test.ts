import { describe, expect, it } from 'vitest';

import { InputPathSchema, ProcessCommandOptionsSchema } from '../schemas.js';

describe('ProcessCommandOptionsSchema', () => {
  it('should default the format to csv', () => {
    expect(ProcessCommandOptionsSchema.parse({})).toEqual({ format: 'csv' });
  });

  it('should accept every option', () => {
    const options = ProcessCommandOptionsSchema.parse({
      format: 'json',
      logLevel: ' DEBUG ',
      logFile: 'logs/run.jsonl',
      queueCapacity: '16',
    });

    expect(options).toEqual({ format: 'json', logLevel: 'debug', logFile: 'logs/run.jsonl', queueCapacity: 16 });
  });

  it('should reject unknown formats', () => {
    const result = ProcessCommandOptionsSchema.safeParse({ format: 'xml' });

    expect(result.error?.issues[0]?.message).toBe('Format must be one of: csv, json');
  });

  it('should reject unknown log levels', () => {
    const result = ProcessCommandOptionsSchema.safeParse({ logLevel: 'loud' });

    expect(result.error?.issues[0]?.message).toBe('Log level must be one of: trace, debug, info, warn, error');
  });

  it('should reject queue capacities that are not positive integers', () => {
    for (const queueCapacity of ['0', '-3', '2.5', 'many']) {
      const result = ProcessCommandOptionsSchema.safeParse({ queueCapacity });
      expect(result.error?.issues[0]?.message).toBe('Queue capacity must be a positive integer');
    }
  });
});

describe('InputPathSchema', () => {
  it('should trim the path', () => {
    expect(InputPathSchema.parse(' data/tx.csv ')).toBe('data/tx.csv');
  });

  it('should reject an empty path', () => {
    expect(InputPathSchema.safeParse('  ').error?.issues[0]?.message).toBe('Input path must not be empty');
  });
});

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { SourceFormatError } from '@txledger/ingestion';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { InputNotFoundError, ProcessHandler } from '../process-handler.js';
import { formatSnapshotCsv } from '../process-utils.js';

describe('ProcessHandler', () => {
  let dir: string;
  let handler: ProcessHandler;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'txledger-process-'));
    handler = new ProcessHandler();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeInput(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, 'utf8');
    return path;
  }

  it('should process a transactions file', async () => {
    const inputPath = writeInput(
      'transactions.csv',
      [
        'type, client, tx, amount',
        'deposit, 1, 1, 1.0',
        'deposit, 2, 2, 2.0',
        'deposit, 1, 3, 2.0',
        'withdrawal, 1, 4, 1.5',
        'withdrawal, 2, 5, 3.0',
        '',
      ].join('\n')
    );

    const result = (await handler.execute({ inputPath, queueCapacity: 4 }))._unsafeUnwrap();

    expect(formatSnapshotCsv(result.accounts)).toBe(
      'client,available,held,total,locked\n1,1.5,0,1.5,false\n2,2,0,2,false\n'
    );
    expect(result.applied).toBe(4);
    expect(result.rejected).toBe(1);
  });

  it('should report a missing input file', async () => {
    const inputPath = join(dir, 'missing.csv');

    const error = (await handler.execute({ inputPath, queueCapacity: 4 }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(InputNotFoundError);
    expect(error.message).toBe(`Input file not found: ${inputPath}`);
  });

  it('should treat a directory as not found', async () => {
    const error = (await handler.execute({ inputPath: dir, queueCapacity: 4 }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(InputNotFoundError);
  });

  it('should fail on a file without the required columns', async () => {
    const inputPath = writeInput('other.csv', 'date,description\n2024-01-01,coffee\n');

    const error = (await handler.execute({ inputPath, queueCapacity: 4 }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(SourceFormatError);
    expect(error.message).toBe('Missing required column(s): type, client, tx');
  });
});

import type { EngineConfig } from '@txledger/env';
import { SourceFormatError } from '@txledger/ingestion';
import type { AccountSnapshot } from '@txledger/ledger';

import { ExitCodes, type ExitCode } from '../shared/exit-codes.js';
import type { OutputFormat, ProcessCommandOptions } from '../shared/schemas.js';

import { InputNotFoundError, type ProcessError, type ProcessHandlerParams } from './process-handler.js';

export const SNAPSHOT_CSV_HEADER = 'client,available,held,total,locked';

/**
 * Snapshot as plain output data, amounts rendered with four decimals at most.
 */
export interface SnapshotRow {
  client: number;
  available: string;
  held: string;
  total: string;
  locked: boolean;
}

export function toSnapshotRow(account: AccountSnapshot): SnapshotRow {
  return {
    client: account.client,
    available: account.available.format(),
    held: account.held.format(),
    total: account.total.format(),
    locked: account.locked,
  };
}

/**
 * Header line, then one line per account. The header is written even when
 * there are no accounts.
 */
export function formatSnapshotCsv(accounts: readonly AccountSnapshot[]): string {
  const lines = [SNAPSHOT_CSV_HEADER];
  for (const row of accounts.map(toSnapshotRow)) {
    lines.push([String(row.client), row.available, row.held, row.total, String(row.locked)].join(','));
  }
  return `${lines.join('\n')}\n`;
}

export function formatSnapshotJson(accounts: readonly AccountSnapshot[]): string {
  return `${JSON.stringify(accounts.map(toSnapshotRow), undefined, 2)}\n`;
}

export function formatSnapshot(accounts: readonly AccountSnapshot[], format: OutputFormat): string {
  return format === 'json' ? formatSnapshotJson(accounts) : formatSnapshotCsv(accounts);
}

/**
 * Build handler parameters from validated CLI flags. Flags win over the environment.
 */
export function buildProcessParams(
  inputPath: string,
  options: ProcessCommandOptions,
  config: EngineConfig
): ProcessHandlerParams {
  return {
    inputPath,
    queueCapacity: options.queueCapacity ?? config.queueCapacity,
  };
}

export function exitCodeForError(error: ProcessError): ExitCode {
  if (error instanceof InputNotFoundError) {
    return ExitCodes.NOT_FOUND;
  }
  if (error instanceof SourceFormatError) {
    return ExitCodes.VALIDATION_ERROR;
  }
  return ExitCodes.GENERAL_ERROR;
}

import { getEngineConfig, type EngineConfig } from '@txledger/env';
import { flushLoggers } from '@txledger/logger';
import type { Command } from 'commander';

import { displayCliError } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { configureCliLogger } from '../shared/logger-setup.js';
import { InputPathSchema, ProcessCommandOptionsSchema } from '../shared/schemas.js';

import { ProcessHandler } from './process-handler.js';
import { buildProcessParams, exitCodeForError, formatSnapshot } from './process-utils.js';

/**
 * Register the process command. It is the default command, so
 * `txledger transactions.csv` runs it.
 */
export function registerProcessCommand(program: Command): void {
  program
    .command('process', { isDefault: true })
    .description('Apply a transactions CSV and print the final account balances')
    .argument('<input>', 'Path to the transactions CSV file')
    .option('--format <format>', 'Output format (csv or json)', 'csv')
    .option('--log-level <level>', 'Minimum level of log lines written to stderr')
    .option('--log-file <path>', 'Also append JSON log lines to this file')
    .option('--queue-capacity <n>', 'Transactions buffered between the reader and the engine')
    .action(async (input: unknown, rawOptions: unknown) => {
      await executeProcessCommand(input, rawOptions);
    });
}

/**
 * Execute the process command.
 */
async function executeProcessCommand(rawInput: unknown, rawOptions: unknown): Promise<void> {
  // Validate arguments at CLI boundary with Zod
  const inputResult = InputPathSchema.safeParse(rawInput);
  const optionsResult = ProcessCommandOptionsSchema.safeParse(rawOptions);
  if (!inputResult.success || !optionsResult.success) {
    const firstError = (inputResult.error ?? optionsResult.error)?.issues[0];
    displayCliError(new Error(firstError?.message ?? 'Invalid arguments'), ExitCodes.INVALID_ARGS);
  }

  const inputPath = inputResult.data;
  const options = optionsResult.data;

  let config: EngineConfig;
  try {
    configureCliLogger({ logLevel: options.logLevel, logFile: options.logFile });
    config = getEngineConfig();
  } catch (error) {
    displayCliError(error instanceof Error ? error : new Error(String(error)), ExitCodes.CONFIG_ERROR);
  }

  try {
    const handler = new ProcessHandler();
    const result = await handler.execute(buildProcessParams(inputPath, options, config));

    if (result.isErr()) {
      displayCliError(result.error, exitCodeForError(result.error));
    }

    process.stdout.write(formatSnapshot(result.value.accounts, options.format));
    flushLoggers();
  } catch (error) {
    displayCliError(error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
  }
}

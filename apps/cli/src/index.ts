#!/usr/bin/env node
import { flushLoggers, getLogger } from '@txledger/logger';
import { Command } from 'commander';

import { registerProcessCommand } from './features/process/process.js';
import { displayCliError } from './features/shared/cli-error.js';
import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('txledger')
    .description('Apply transaction records to client accounts and print the final balances')
    .version('0.1.0');

  // Commander has already printed its message; map usage errors to INVALID_ARGS.
  // Set before registering commands so they inherit it.
  program.exitOverride((error) => {
    exitWithCode(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS);
  });

  // Process command - default, so `txledger <input>` works without naming it
  registerProcessCommand(program);

  await program.parseAsync();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  flushLoggers();
  process.exit(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  displayCliError(error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
});

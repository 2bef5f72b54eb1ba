import { flushLoggers } from '@txledger/logger';
import pc from 'picocolors';

import { ExitCodes, exitWithCode, type ExitCode } from './exit-codes.js';

type Colors = ReturnType<typeof pc.createColors>;

/**
 * Tips shown after error messages, keyed by exit code.
 */
const ERROR_TIPS: Partial<Record<ExitCode, string>> = {
  [ExitCodes.INVALID_ARGS]: 'Check your command arguments and try again. Run with --help for usage information.',
  [ExitCodes.NOT_FOUND]: 'The input file was not found. Double-check the path and try again.',
  [ExitCodes.VALIDATION_ERROR]: 'The input must be a CSV file with a "type,client,tx,amount" header.',
  [ExitCodes.CONFIG_ERROR]: 'Check the TXLEDGER_* and LOGGER_* environment variables.',
};

/**
 * Render an error for stderr: the message, then a tip for the exit code when
 * there is one, then the stack trace in development.
 */
export function formatCliError(error: Error, exitCode: ExitCode, colors: Colors = pc): string {
  let text = `\n${colors.red('✗')} Error: ${error.message}\n`;

  const tip = ERROR_TIPS[exitCode];
  if (tip) {
    text += `\n${colors.dim(tip)}\n`;
  }

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    text += `\n${colors.dim(error.stack)}\n\n`;
  }

  return text;
}

/**
 * Display a CLI error on stderr, flush pending log entries and exit.
 */
export function displayCliError(error: Error, exitCode: ExitCode): never {
  process.stderr.write(formatCliError(error, exitCode));
  flushLoggers();
  exitWithCode(exitCode);
}

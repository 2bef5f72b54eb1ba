import {
  ConsoleSink,
  FileSink,
  initLogger,
  validateLoggerEnv,
  type LogLevel,
  type Sink,
} from '@txledger/logger';

export interface CliLoggerOptions {
  /** Overrides LOGGER_LOG_LEVEL */
  logLevel?: LogLevel | undefined;
  /** Overrides LOGGER_FILE_LOG_PATH */
  logFile?: string | undefined;
}

export interface CliLoggerSettings {
  level: LogLevel;
  console: boolean;
  filePath: string | undefined;
}

/**
 * Install the CLI's sinks: colourless-by-default console lines on stderr and
 * an optional JSON-lines file. Flags win over LOGGER_* variables.
 *
 * @throws ZodError when a LOGGER_* variable is invalid
 */
export function configureCliLogger(
  options: CliLoggerOptions,
  env: NodeJS.ProcessEnv = process.env
): CliLoggerSettings {
  const envConfig = validateLoggerEnv(env);

  const settings: CliLoggerSettings = {
    level: options.logLevel ?? envConfig.LOGGER_LOG_LEVEL,
    console: envConfig.LOGGER_CONSOLE_ENABLED,
    filePath: options.logFile ?? envConfig.LOGGER_FILE_LOG_PATH,
  };

  const sinks: Sink[] = [];
  if (settings.console) {
    sinks.push(new ConsoleSink({ color: envConfig.LOGGER_COLOR }));
  }
  if (settings.filePath) {
    sinks.push(new FileSink({ path: settings.filePath }));
  }

  initLogger({ level: settings.level, sinks });
  return settings;
}

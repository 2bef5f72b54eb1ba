import { z } from 'zod';

import { isLogLevel, LOG_LEVELS, type LogLevel } from './logger.js';

const booleanFlag = (defaultValue: 'true' | 'false') =>
  z
    .string()
    .trim()
    .toLowerCase()
    .default(defaultValue)
    .refine((val) => val === 'true' || val === 'false', { message: "Expected 'true' or 'false'" })
    .transform((val) => val === 'true');

export const loggerEnvSchema = z.object({
  LOGGER_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .default('info')
    .refine((val): val is LogLevel => isLogLevel(val), {
      message: `Invalid log level (expected one of: ${LOG_LEVELS.join(', ')})`,
    }),
  LOGGER_CONSOLE_ENABLED: booleanFlag('true'),
  LOGGER_COLOR: booleanFlag('false'),
  LOGGER_FILE_LOG_PATH: z.string().trim().min(1, { message: 'Invalid log file path' }).optional(),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}

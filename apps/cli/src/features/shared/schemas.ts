import { isLogLevel, LOG_LEVELS, type LogLevel } from '@txledger/logger';
import { z } from 'zod';

export const OUTPUT_FORMATS = ['csv', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const QUEUE_CAPACITY_MESSAGE = 'Queue capacity must be a positive integer';

/**
 * Input path argument
 */
export const InputPathSchema = z.string().trim().min(1, { message: 'Input path must not be empty' });

/**
 * Process command options
 */
export const ProcessCommandOptionsSchema = z.object({
  format: z
    .enum(OUTPUT_FORMATS, {
      errorMap: () => ({ message: `Format must be one of: ${OUTPUT_FORMATS.join(', ')}` }),
    })
    .default('csv'),
  logLevel: z
    .string()
    .trim()
    .toLowerCase()
    .refine((val): val is LogLevel => isLogLevel(val), {
      message: `Log level must be one of: ${LOG_LEVELS.join(', ')}`,
    })
    .optional(),
  logFile: z.string().trim().min(1, { message: 'Log file path must not be empty' }).optional(),
  queueCapacity: z.coerce
    .number({ invalid_type_error: QUEUE_CAPACITY_MESSAGE })
    .int({ message: QUEUE_CAPACITY_MESSAGE })
    .min(1, { message: QUEUE_CAPACITY_MESSAGE })
    .max(1_000_000, { message: 'Queue capacity must be at most 1000000' })
    .optional(),
});

export type ProcessCommandOptions = z.infer<typeof ProcessCommandOptionsSchema>;

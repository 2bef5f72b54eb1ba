import { z } from 'zod';

export const DEFAULT_QUEUE_CAPACITY = 100;

export const engineEnvSchema = z.object({
  TXLEDGER_QUEUE_CAPACITY: z
    .string()
    .trim()
    .regex(/^\d+$/, { message: 'Must be a positive integer' })
    .transform((val) => Number.parseInt(val, 10))
    .pipe(z.number().int().min(1, { message: 'Must be a positive integer' }).max(1_000_000))
    .optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export interface EngineConfig {
  /** Capacity of the queue between the CSV producer and the engine. */
  queueCapacity: number;
  nodeEnv: 'development' | 'production' | 'test';
}

let cachedConfig: EngineConfig | undefined;

/**
 * Validates environment variables on first access and caches the result.
 * @throws Error listing every invalid variable
 */
export function getEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  if (!cachedConfig) {
    const result = engineEnvSchema.safeParse(env);
    if (!result.success) {
      const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
      throw new Error(`Environment validation failed:\n${errors}`);
    }
    cachedConfig = {
      queueCapacity: result.data.TXLEDGER_QUEUE_CAPACITY ?? DEFAULT_QUEUE_CAPACITY,
      nodeEnv: result.data.NODE_ENV,
    };
  }
  return cachedConfig;
}

/**
 * Drop the cached configuration so the next call re-reads the environment.
 */
export function resetEngineConfig(): void {
  cachedConfig = undefined;
}

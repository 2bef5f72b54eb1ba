export {
  DEFAULT_QUEUE_CAPACITY,
  engineEnvSchema,
  getEngineConfig,
  resetEngineConfig,
  type EngineConfig,
} from './config.js';

export {
  engineConfigSchema,
  expandEnvVars,
  parseEngineConfig,
  loadEngineConfig,
} from './engine-config.js';
export type { EngineConfig, Environment } from './engine-config.js';

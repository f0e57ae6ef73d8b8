// src/config/index.ts
// Configuration exports

export {
  type CoercionConfig,
  type ConfigValidation,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";

/**
 * Configuration module.
 * Defaults, overridden by the config file, overridden by CLI flags.
 */

export {
  TIMEOUTS,
  LIMITS,
  SCORES,
  HEALING,
  DYNAMIC_VALUE_HEURISTICS,
} from './defaults.js';
export {
  loadConfigFile,
  loadConfigFileOrDefaults,
  resolveRuntimeConfig,
} from './loader.js';
export type { RuntimeConfig, ConfigOverrides } from './loader.js';

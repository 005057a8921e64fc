/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 */

export {
  TIMEOUTS,
  PACING,
  PROGRESS,
  DRIVER,
  URLS,
  MARKERS,
  LIMITS,
  DEFAULT_CONFIG_PATH,
  DEFAULT_OUTPUT_PATH,
} from './defaults.js';
export { loadConfigFile, resolveConfig, ConfigError } from './loader.js';
export type { RuntimeConfig, CliOverrides } from './loader.js';

/**
 * Configuration & Environment Management
 *
 * Defaults, JSON config file and environment overrides.
 */

export {
  Config,
  type ConfigOptions,
  configFromEnv,
  DEFAULT_CONFIG_PATH,
  loadConfig,
} from './config.ts';

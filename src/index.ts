/**
 * forgeport: GitLab → GitHub metadata transfer
 *
 * Public API for programmatic usage.
 */

export * from './transfer/index.js';

// Configuration
export {
  loadConfig,
  defaultConfig,
  configFromEnv,
  ConfigError,
  TransferConfigSchema,
  CONFIG_FILE,
  type TransferConfig,
  type TransferConfigInput,
  type LoadConfigOptions,
} from './config.js';

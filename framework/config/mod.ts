/**
 * Configuration
 *
 * Router and logging settings from a JSON file and environment variables.
 */

export {
  Config,
  type ConfigOptions,
  envOptions,
  getConfig,
  type JunctionConfig,
  loadConfig,
  parseConfigOptions,
  type RouterConfig,
  setConfig,
} from './config.ts';

/**
 * ConfigManager - defaults overlaid by a discovered pushgate config file
 *
 * @module config_manager
 */

export {
  ConfigManager,
  CONFIG_FILE_NAMES,
  DEFAULT_CONFIG_FILE_NAME,
  createDefaultConfig,
  mergeConfig,
  parseConfigFile,
  serializeConfig,
} from './config_manager';
export { ConfigError } from './errors';
export type {
  PushgateConfig,
  PushgateConfigFile,
  OutputConfig,
  OutputFormat,
  LoadedConfig,
  ConfigManagerOptions,
  IConfigManager,
} from './config_manager.types';

/**
 * ConfigManager Types
 */

import type { OverrideRecorderOptions } from '../override_recorder/override_recorder.types';

export type OutputFormat = 'text' | 'json';

export type OutputConfig = {
  format: OutputFormat;
  verbose: boolean;
};

/**
 * Effective pushgate configuration (defaults merged with the config file)
 */
export type PushgateConfig = {
  override: OverrideRecorderOptions;
  output: OutputConfig;
};

/**
 * Shape of a config file: every key optional. Unknown top-level keys are
 * allowed and carried into the merged result.
 */
export type PushgateConfigFile = {
  override?: Partial<OverrideRecorderOptions>;
  output?: Partial<OutputConfig>;
  [key: string]: unknown;
};

export type LoadedConfig = {
  config: PushgateConfig;
  /** Config file that was merged over the defaults, or null for defaults only */
  source: string | null;
};

export type ConfigManagerOptions = {
  /** Directory where the upward config file search starts */
  projectRoot: string;
  /** Explicit config file; skips discovery */
  configPath?: string;
};

export interface IConfigManager {
  findConfigFile(): string | null;
  loadConfig(): Promise<LoadedConfig>;
  saveDefaultConfig(options?: { force?: boolean }): Promise<string>;
}

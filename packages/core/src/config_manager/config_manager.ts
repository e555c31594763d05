/**
 * ConfigManager - layered configuration for pushgate
 *
 * Built-in defaults, overlaid by the first config file found in the project
 * root or one of its parents. YAML files are read with js-yaml, JSON files
 * with JSON.parse, and both are validated with ajv before merging.
 *
 * A config file that cannot be read, parsed or validated is reported as a
 * warning and the defaults are used instead.
 *
 * @example
 * ```typescript
 * const manager = new ConfigManager({ projectRoot: '/path/to/repo' });
 * const { config, source } = await manager.loadConfig();
 * ```
 */

import { promises as fs, existsSync } from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import * as yaml from 'js-yaml';
import configSchema from './config.schema.json';
import type {
  ConfigManagerOptions,
  IConfigManager,
  LoadedConfig,
  PushgateConfig,
  PushgateConfigFile,
} from './config_manager.types';
import { ConfigError } from './errors';
import { DEFAULT_OVERRIDE_OPTIONS } from '../override_recorder/override_recorder';
import { createLogger } from '../logger/logger';

const logger = createLogger('[ConfigLoader] ');

/** Searched in this order in every directory */
export const CONFIG_FILE_NAMES = [
  'pushgate.yaml',
  'pushgate.yml',
  'pushgate.json',
  '.pushgate.yaml',
  '.pushgate.yml',
  '.pushgate.json',
] as const;

export const DEFAULT_CONFIG_FILE_NAME = 'pushgate.yaml';

export function createDefaultConfig(): PushgateConfig {
  return {
    override: { ...DEFAULT_OVERRIDE_OPTIONS },
    output: { format: 'text', verbose: false },
  };
}

let validator: ValidateFunction<PushgateConfigFile> | null = null;

function getValidator(): ValidateFunction<PushgateConfigFile> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true });
    validator = ajv.compile<PushgateConfigFile>(configSchema);
  }
  return validator;
}

/**
 * Overlays a config file on the defaults. Nested sections merge key by key;
 * unknown top-level keys are kept as they are.
 */
export function mergeConfig(defaults: PushgateConfig, custom: PushgateConfigFile): PushgateConfig {
  return {
    ...custom,
    override: { ...defaults.override, ...custom.override },
    output: { ...defaults.output, ...custom.output },
  };
}

/**
 * Parses and validates config file content.
 *
 * @throws ConfigError for unsupported extensions, syntax errors and schema violations
 */
export function parseConfigFile(configPath: string, content: string): PushgateConfigFile {
  let parsed: unknown;
  try {
    if (configPath.endsWith('.yaml') || configPath.endsWith('.yml')) {
      parsed = yaml.load(content);
    } else if (configPath.endsWith('.json')) {
      parsed = JSON.parse(content);
    } else {
      throw new ConfigError(configPath, 'unsupported config file format');
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(configPath, error instanceof Error ? error.message : String(error));
  }

  // an empty file means "no overrides"
  const candidate = parsed ?? {};
  const validate = getValidator();
  if (!validate(candidate)) {
    const details = (validate.errors ?? [])
      .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ');
    throw new ConfigError(configPath, details);
  }
  return candidate;
}

export function serializeConfig(config: PushgateConfig): string {
  return yaml.dump(config, { indent: 2 });
}

export class ConfigManager implements IConfigManager {
  private readonly projectRoot: string;
  private readonly configPath: string | undefined;
  private loaded: LoadedConfig | null = null;

  constructor(options: ConfigManagerOptions) {
    this.projectRoot = options.projectRoot;
    this.configPath = options.configPath;
  }

  /**
   * Finds the config file: the explicit path when given, otherwise the first
   * known file name in the project root or one of its parents.
   */
  findConfigFile(): string | null {
    if (this.configPath) {
      return this.configPath;
    }

    let currentDir = path.resolve(this.projectRoot);
    while (true) {
      for (const name of CONFIG_FILE_NAMES) {
        const candidate = path.join(currentDir, name);
        if (existsSync(candidate)) {
          return candidate;
        }
      }
      const parentDir = path.dirname(currentDir);
      if (parentDir === currentDir) {
        return null;
      }
      currentDir = parentDir;
    }
  }

  /**
   * Loads the effective configuration. The result is cached per instance.
   */
  async loadConfig(): Promise<LoadedConfig> {
    if (this.loaded) {
      return this.loaded;
    }

    const defaults = createDefaultConfig();
    const source = this.findConfigFile();

    if (!source) {
      this.loaded = { config: defaults, source: null };
      return this.loaded;
    }

    try {
      const content = await fs.readFile(source, 'utf-8');
      const custom = parseConfigFile(source, content);
      this.loaded = { config: mergeConfig(defaults, custom), source };
    } catch (error) {
      logger.warn(`Could not load config from ${source}: ${error instanceof Error ? error.message : String(error)}`);
      logger.warn('Using default configuration');
      this.loaded = { config: defaults, source: null };
    }

    return this.loaded;
  }

  /**
   * Writes the default configuration to pushgate.yaml in the project root.
   *
   * @returns Path of the written file
   * @throws ConfigError when the file exists and force is not set
   */
  async saveDefaultConfig(options: { force?: boolean } = {}): Promise<string> {
    const target = path.join(this.projectRoot, DEFAULT_CONFIG_FILE_NAME);

    if (!options.force && existsSync(target)) {
      throw new ConfigError(target, 'file already exists (use force to overwrite)');
    }

    await fs.writeFile(target, serializeConfig(createDefaultConfig()), 'utf-8');
    return target;
  }
}

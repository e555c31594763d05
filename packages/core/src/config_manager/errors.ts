/**
 * Error thrown when a config file cannot be read, parsed or validated
 */
export class ConfigError extends Error {
  public readonly configPath: string;

  constructor(configPath: string, message: string) {
    super(`Invalid config ${configPath}: ${message}`);
    this.name = 'ConfigError';
    this.configPath = configPath;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

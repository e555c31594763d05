/**
 * Standard Command Interface for the pushgate CLI
 *
 * All commands implement this interface so they can be registered the same
 * way and tested without a Commander program.
 */

import { Command } from 'commander';

/**
 * Base options that all commands support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Options for commands that operate on a repository
 */
export interface RepositoryCommandOptions extends BaseCommandOptions {
  /** Repository root (default: git top level of the current directory) */
  repo?: string;
  /** Explicit config file (default: discovered from the repository root) */
  config?: string;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}

/**
 * Executable command interface
 */
export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  execute(options: TOptions): Promise<void>;
}

export interface ICompleteCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  extends ICommand, IExecutableCommand<TOptions> { }

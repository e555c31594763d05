import { Command } from 'commander';
import { OverrideCommand } from './override-command';

/**
 * Register the override command
 */
export function registerOverrideCommand(program: Command): void {
  const overrideCommand = new OverrideCommand();
  overrideCommand.register(program);
}

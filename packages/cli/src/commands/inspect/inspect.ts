import { Command } from 'commander';
import { InspectCommand } from './inspect-command';

/**
 * Register the inspect command
 */
export function registerInspectCommand(program: Command): void {
  const inspectCommand = new InspectCommand();
  inspectCommand.register(program);
}

import { Command } from 'commander';
import { registerRunCommand } from './run';
import { registerPromptCommand } from './prompt';
import { registerStatusCommand } from './status';
import { registerHistoryCommand } from './history';
import { registerConfigCommand } from './config';

/**
 * Register all subcommands here
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerPromptCommand(program);
  registerStatusCommand(program);
  registerHistoryCommand(program);
  registerConfigCommand(program);
}

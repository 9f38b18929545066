#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './cli/commands';

const program = new Command();

program
  .name('taskpilot')
  .description('Plans and carries out tasks on a local or remote machine with a language model')
  .version('0.1.0')
  .option('--verbose', 'Show detailed output for every command');

registerCommands(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});

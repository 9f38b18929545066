import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import { promptForConfig } from '../prompts';
import { loadConfig } from '../../config/loader';
import type { Config } from '../../config/validator';
import { createLanguageModel } from '../../agents/clients';

const MASK = '********';

/** Copy of the configuration with secrets replaced */
export function maskConfig(config: Config): Config {
  return {
    ...config,
    model: { ...config.model, ...(config.model.api_key ? { api_key: MASK } : {}) },
  };
}

export function registerConfigCommand(program: Command): void {
  const configCommand = program.command('config').description('Manage configuration');

  configCommand
    .command('init')
    .description('Write a .env file interactively')
    .action(async () => {
      console.log(chalk.blue('Initializing configuration...'));
      const lines = await promptForConfig();

      const targetPath = path.join(process.cwd(), '.env');
      if (fs.existsSync(targetPath)) {
        console.log(chalk.yellow('.env file already exists. Overwriting...'));
      }

      fs.writeFileSync(targetPath, `${lines.join('\n')}\n`);
      console.log(chalk.green(`Configuration saved to ${targetPath}`));
    });

  configCommand
    .command('validate')
    .description('Validate current configuration')
    .option('--ping', 'Also send a one-line request to the configured model')
    .action(async (options: { ping?: boolean }) => {
      try {
        const config = loadConfig();
        console.log(chalk.green('✓ Configuration is valid.'));
        console.log(chalk.gray(`  engine: ${config.model.engine}, model: ${config.model.model}`));

        if (options.ping) {
          const reply = await createLanguageModel(config.model).send([{ role: 'user', content: 'Reply with the single word OK.' }]);
          console.log(chalk.green(`✓ Model answered: ${reply.trim().slice(0, 80)}`));
        }
      } catch (error) {
        console.error(chalk.red('✗ Configuration check failed:'));
        if (error instanceof Error) {
          console.error(chalk.red(error.message));
        }
        process.exitCode = 1;
      }
    });

  configCommand
    .command('show')
    .description('Show current configuration')
    .action(() => {
      try {
        const config = loadConfig();
        console.log(JSON.stringify(maskConfig(config), null, 2));
      } catch (error) {
        console.error(chalk.red('Failed to load configuration:'));
        if (error instanceof Error) {
          console.error(chalk.red(error.message));
        }
        process.exitCode = 1;
      }
    });
}

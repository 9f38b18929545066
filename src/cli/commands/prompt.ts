import { Command } from 'commander';
import inquirer from 'inquirer';
import { loadConfig } from '../../config/loader';
import { createLanguageModel } from '../../agents/clients';
import { PromptCreator } from '../../agents/prompt-creator';
import { formatError, formatInfo, formatStep, formatVerboseSection } from '../formatters';
import { joinGoal } from '../validators';
import { promptForGoal } from '../prompts';
import { executeRunCommand } from './run';
import type { RunCommandOptions } from './run';

type PromptCommandOptions = {
  run?: boolean;
  autonomous?: boolean;
  verbose?: boolean;
};

export function registerPromptCommand(program: Command): void {
  program
    .command('prompt')
    .description('Work out a precise task prompt together with the model, then optionally run it')
    .argument('[idea...]', 'Rough description of the task')
    .option('--run', 'Run the finished prompt without asking')
    .option('--autonomous', 'Run the finished prompt in autonomous mode')
    .option('--verbose', 'Show detailed output')
    .action(async (idea: string[], options: PromptCommandOptions) => {
      await executePromptCommand(joinGoal(idea), options, program.opts().verbose === true);
    });
}

export async function executePromptCommand(ideaText: string, options: PromptCommandOptions, globalVerbose = false): Promise<void> {
  let finalPrompt: string;
  try {
    const config = loadConfig();
    const idea = ideaText || (await promptForGoal());
    const creator = new PromptCreator(createLanguageModel(config.model));

    console.log(formatStep('Refining the task prompt (leave an answer empty to stop)'));
    finalPrompt = await creator.create(idea, async (question, draft) => {
      if (globalVerbose || options.verbose) console.log(formatVerboseSection('Current draft', draft));
      const { answer } = await inquirer.prompt<{ answer: string }>([{ type: 'input', name: 'answer', message: question }]);
      return answer;
    });

    console.log(formatVerboseSection('Task prompt', finalPrompt));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(formatError(msg));
    process.exitCode = 1;
    return;
  }

  let shouldRun = Boolean(options.run);
  if (!shouldRun && process.stdin.isTTY) {
    const { run } = await inquirer.prompt<{ run: boolean }>([{ type: 'confirm', name: 'run', message: 'Run this prompt now?', default: true }]);
    shouldRun = run;
  }

  if (!shouldRun) {
    console.log(formatInfo('Not running. Pass the prompt to `taskpilot run` when ready.'));
    return;
  }

  const runOptions: RunCommandOptions = { autonomous: options.autonomous, verbose: options.verbose };
  await executeRunCommand(finalPrompt, runOptions, globalVerbose);
}

import inquirer from 'inquirer';
import type { Answers, QuestionCollection } from 'inquirer';
import { ENGINES } from '../config/validator';
import type { Engine } from '../config/validator';
import { DEFAULT_MODELS } from '../config/defaults';
import { InteractionInterruptedError } from '../orchestrator/errors';

/**
 * Run an inquirer prompt that the signal can cancel. Cancelling closes the
 * prompt and rejects with InteractionInterruptedError.
 */
export function promptWithSignal<T extends Answers>(questions: QuestionCollection<T>, signal?: AbortSignal): Promise<T> {
  if (signal?.aborted) return Promise.reject(new InteractionInterruptedError());

  const prompt = inquirer.prompt<T>(questions);
  if (!signal) return prompt;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      prompt.ui.close();
      reject(new InteractionInterruptedError());
    };
    signal.addEventListener('abort', onAbort, { once: true });
    prompt.then(
      (answers) => {
        signal.removeEventListener('abort', onAbort);
        resolve(answers);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

type ConfigAnswers = {
  engine: Engine;
  apiKey: string;
  model: string;
  baseUrl: string;
};

const API_KEY_ENV: Record<Engine, string | undefined> = {
  openai: 'OPENAI_API_KEY',
  openrouter: 'OPENROUTER_API_KEY',
  gemini: 'GOOGLE_API_KEY',
  ollama: undefined,
};

const MODEL_ENV: Record<Engine, string> = {
  openai: 'OPENAI_MODEL',
  openrouter: 'OPENROUTER_MODEL',
  gemini: 'GOOGLE_MODEL',
  ollama: 'OLLAMA_MODEL',
};

/** Ask for engine settings and return the `.env` lines that configure them */
export const promptForConfig = async (): Promise<string[]> => {
  const answers = await inquirer.prompt<ConfigAnswers>([
    {
      type: 'list',
      name: 'engine',
      message: 'Select the model engine:',
      choices: [...ENGINES],
      default: 'openai',
    },
    {
      type: 'password',
      name: 'apiKey',
      message: 'Enter the API key:',
      mask: '*',
      when: (a: Partial<ConfigAnswers>) => a.engine !== 'ollama',
      validate: (input: string) => input.length > 0 || 'An API key is required for this engine',
    },
    {
      type: 'input',
      name: 'baseUrl',
      message: 'Ollama URL:',
      default: 'http://localhost:11434',
      when: (a: Partial<ConfigAnswers>) => a.engine === 'ollama',
    },
    {
      type: 'input',
      name: 'model',
      message: 'Model name:',
      default: (a: Partial<ConfigAnswers>) => DEFAULT_MODELS[a.engine ?? 'openai'],
    },
  ]);

  const lines = [`AI_ENGINE=${answers.engine}`];
  const keyVar = API_KEY_ENV[answers.engine];
  if (keyVar && answers.apiKey) lines.push(`${keyVar}=${answers.apiKey}`);
  if (answers.engine === 'ollama' && answers.baseUrl) lines.push(`OLLAMA_URL=${answers.baseUrl}`);
  if (answers.model) lines.push(`${MODEL_ENV[answers.engine]}=${answers.model}`);
  return lines;
};

/** Ask for the next goal; an empty answer ends the session */
export const promptForNextGoal = async (): Promise<string> => {
  const { goal } = await inquirer.prompt<{ goal: string }>([
    {
      type: 'input',
      name: 'goal',
      message: 'Next goal (leave empty to exit):',
    },
  ]);
  return goal.trim();
};

export const promptForGoal = async (): Promise<string> => {
  const { goal } = await inquirer.prompt<{ goal: string }>([
    {
      type: 'input',
      name: 'goal',
      message: 'What should I do?',
      validate: (input: string) => input.trim().length > 0 || 'Please describe the goal',
    },
  ]);
  return goal.trim();
};

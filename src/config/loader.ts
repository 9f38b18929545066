import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, Config, ENGINES, Engine } from './validator';
import { defaults, DEFAULT_MODELS } from './defaults';
import { TaskPilotError } from '../utils/errors';

/**
 * DeepPartial allows recursive partials of the Config type.
 * Used for CLI and YAML overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? U[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export class ConfigValidationError extends TaskPilotError {
  constructor(public issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`, 'CONFIG_INVALID');
    this.name = 'ConfigValidationError';
  }
}

export interface LoadConfigOptions {
  /** Directory searched for `.env` and `config.yaml` (default: process.cwd()) */
  cwd?: string;
  /** Environment to read from (default: process.env, after loading `.env`) */
  env?: NodeJS.ProcessEnv;
}

const API_KEY_VARS: Record<Engine, string | undefined> = {
  openai: 'OPENAI_API_KEY',
  openrouter: 'OPENROUTER_API_KEY',
  gemini: 'GOOGLE_API_KEY',
  ollama: undefined,
};

const MODEL_VARS: Record<Engine, string> = {
  openai: 'OPENAI_MODEL',
  openrouter: 'OPENROUTER_MODEL',
  gemini: 'GOOGLE_MODEL',
  ollama: 'OLLAMA_MODEL',
};

export function loadConfig(cliOverrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();

  let env = options.env;
  if (!env) {
    // Load .env into process.env
    dotenv.config({ path: path.join(cwd, '.env') });
    env = process.env;
  }

  // 1. Read config.yaml (if exists)
  let fileConfig: Record<string, unknown> = {};
  const yamlPath = path.join(cwd, 'config.yaml');
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isRecord(parsedYaml)) {
      fileConfig = parsedYaml;
    }
  }

  // 2. The engine decides which key and model defaults apply
  const engine = resolveEngine(cliOverrides.model?.engine, env.AI_ENGINE, isRecord(fileConfig.model) ? fileConfig.model.engine : undefined);

  const config: Record<string, unknown> = structuredClone(defaults);
  deepMerge(config, { model: { engine, model: DEFAULT_MODELS[engine] } });

  // 3. Override with config.yaml
  deepMerge(config, fileConfig);

  // 4. Override with Environment Variables
  const keyVar = API_KEY_VARS[engine];
  const envMapping = {
    model: {
      engine,
      api_key: keyVar ? env[keyVar] : undefined,
      model: env[MODEL_VARS[engine]],
      base_url: engine === 'ollama' ? env.OLLAMA_URL : undefined,
      temperature: env.OPENAI_TEMPERATURE,
      max_tokens: env.OPENAI_MAX_TOKENS,
    },
    security: { kill_switch: parseFlag(env.TASKPILOT_KILL_SWITCH) },
    web_search: { engine: env.WEB_SEARCH_ENGINE, searxng_url: env.SEARXNG_URL },
    logging: { level: env.LOG_LEVEL?.toLowerCase(), file: env.LOG_FILE },
  };
  deepMerge(config, envMapping);

  // 5. Override with CLI Arguments
  deepMerge(config, cliOverrides);

  // 6. Validate with Zod
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`));
  }

  return result.data;
}

function resolveEngine(...candidates: unknown[]): Engine {
  for (const candidate of candidates) {
    if (typeof candidate !== 'string') continue;
    const normalized = candidate.trim().toLowerCase();
    // `google` is accepted as an alias of the Gemini engine
    const name = normalized === 'google' ? 'gemini' : normalized;
    const match = ENGINES.find((e) => e === name);
    if (match) return match;
    throw new ConfigValidationError([`model.engine: unknown engine "${candidate}" (expected one of ${ENGINES.join(', ')})`]);
  }
  return defaults.model.engine;
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Simple deep merge for config objects.
 * Undefined source values never overwrite existing ones.
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];

    if (isRecord(sourceValue)) {
      const existing = target[key];
      const nested: Record<string, unknown> = isRecord(existing) ? existing : {};
      target[key] = nested;
      deepMerge(nested, sourceValue);
    } else if (sourceValue !== undefined) {
      target[key] = sourceValue;
    }
  }
}

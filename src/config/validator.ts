import { z } from 'zod';

export const ENGINES = ['openai', 'openrouter', 'gemini', 'ollama'] as const;
export const EXECUTION_MODES = ['confirm-each', 'autonomous'] as const;

const positiveInt = z.coerce.number().int().positive();

export const ModelConfigSchema = z.object({
  engine: z.enum(ENGINES),
  api_key: z.string().optional(),
  model: z.string().min(1),
  base_url: z.string().url().optional(),
  temperature: z.coerce.number().min(0).max(2),
  max_tokens: positiveInt,
  timeout_ms: positiveInt,
  max_retries: z.coerce.number().int().min(0).max(10),
});

export const ConfigSchema = z
  .object({
    model: ModelConfigSchema,
    agent: z.object({
      mode: z.enum(EXECUTION_MODES),
      step_limit: positiveInt,
      max_response_attempts: positiveInt,
      deep_analysis: z.boolean(),
    }),
    context: z.object({
      max_messages: positiveInt,
      max_tokens: positiveInt,
    }),
    execution: z.object({
      local_timeout_ms: positiveInt,
      remote_timeout_ms: positiveInt,
    }),
    security: z.object({
      kill_switch: z.boolean(),
      dangerous_patterns: z.array(z.string()),
      caution_patterns: z.array(z.string()),
    }),
    web_search: z.object({
      engine: z.enum(['duckduckgo', 'searxng']),
      searxng_url: z.string().url(),
      max_iterations: positiveInt,
      max_sources: positiveInt,
      min_confidence: z.coerce.number().min(0).max(1),
      timeout_ms: positiveInt,
      max_content_length: positiveInt,
    }),
    logging: z.object({
      level: z.enum(['debug', 'info', 'warn', 'error']),
      file: z.string().optional(),
    }),
    storage: z.object({
      root_dir: z.string().min(1),
    }),
  })
  .superRefine((config, ctx) => {
    const needsKey = config.model.engine === 'openai' || config.model.engine === 'openrouter' || config.model.engine === 'gemini';
    if (needsKey && !config.model.api_key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['model', 'api_key'],
        message: `API key is required for engine "${config.model.engine}"`,
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type Engine = (typeof ENGINES)[number];
export type ExecutionMode = (typeof EXECUTION_MODES)[number];

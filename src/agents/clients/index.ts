import type { ModelConfig } from '../../config/validator';
import type { LanguageModel } from '../language-model';
import type { Logger } from '../../utils/logger';
import { OpenAIChatClient } from './openai-client';
import { GeminiClient } from './gemini-client';
import { OllamaClient } from './ollama-client';

/** Resolve the configured engine once, at session creation */
export function createLanguageModel(config: ModelConfig, logger?: Logger): LanguageModel {
  switch (config.engine) {
    case 'openai':
    case 'openrouter':
      return new OpenAIChatClient(config, { logger });
    case 'gemini':
      return new GeminiClient(config, { logger });
    case 'ollama':
      return new OllamaClient(config, { logger });
  }
}

export { LanguageModelError, LanguageModelAuthError, LanguageModelRateLimitError } from './errors';

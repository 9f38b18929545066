import { z } from 'zod';
import { HttpModelClient, flattenToolRole } from './http-model-client';
import type { HttpModelClientOptions } from './http-model-client';
import { LanguageModelError } from './errors';
import type { ChatMessage } from '../language-model';
import type { ModelConfig } from '../../config/validator';

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
});

const BASE_URLS = {
  openai: 'https://api.openai.com/v1',
  openrouter: 'https://openrouter.ai/api/v1',
} as const;

/** OpenAI-style chat completions; also serves OpenRouter, which speaks the same API */
export class OpenAIChatClient extends HttpModelClient {
  readonly name: string;

  constructor(config: ModelConfig, options: Partial<HttpModelClientOptions> = {}) {
    const flavour = config.engine === 'openrouter' ? 'openrouter' : 'openai';
    super(config, {
      ...options,
      baseURL: config.base_url ?? BASE_URLS[flavour],
      headers: {
        Authorization: `Bearer ${config.api_key ?? ''}`,
        ...(flavour === 'openrouter' ? { 'X-Title': 'taskpilot' } : {}),
        ...options.headers,
      },
    });
    this.name = flavour === 'openrouter' ? `openrouter:${config.model}` : `openai:${config.model}`;
  }

  protected async complete(messages: readonly ChatMessage[]): Promise<string> {
    const { data } = await this.http.post<unknown>('/chat/completions', {
      model: this.config.model,
      messages: messages.map(flattenToolRole),
      temperature: this.config.temperature,
      max_tokens: this.config.max_tokens,
    });

    const parsed = ChatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw new LanguageModelError(`${this.name}: unexpected response shape (${parsed.error.issues[0]?.message ?? 'unknown'})`);
    }
    return parsed.data.choices[0]?.message.content ?? '';
  }
}

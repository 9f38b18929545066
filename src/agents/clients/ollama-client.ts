import { z } from 'zod';
import { HttpModelClient, flattenToolRole } from './http-model-client';
import type { HttpModelClientOptions } from './http-model-client';
import { LanguageModelError } from './errors';
import type { ChatMessage } from '../language-model';
import type { ModelConfig } from '../../config/validator';

const OllamaChatSchema = z.object({ message: z.object({ content: z.string() }) });

/** Local Ollama server, non-streaming `/api/chat` */
export class OllamaClient extends HttpModelClient {
  readonly name: string;

  constructor(config: ModelConfig, options: Partial<HttpModelClientOptions> = {}) {
    // OLLAMA_URL is commonly given as the full chat endpoint
    const baseURL = (config.base_url ?? 'http://localhost:11434').replace(/\/api\/chat\/?$/, '');
    super(config, { ...options, baseURL });
    this.name = `ollama:${config.model}`;
  }

  protected async complete(messages: readonly ChatMessage[]): Promise<string> {
    const { data } = await this.http.post<unknown>('/api/chat', {
      model: this.config.model,
      messages: messages.map(flattenToolRole),
      stream: false,
      options: { temperature: this.config.temperature, num_predict: this.config.max_tokens },
    });

    const parsed = OllamaChatSchema.safeParse(data);
    if (!parsed.success) {
      throw new LanguageModelError(`${this.name}: unexpected response shape`);
    }
    return parsed.data.message.content;
  }
}

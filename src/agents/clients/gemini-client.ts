import { z } from 'zod';
import { HttpModelClient } from './http-model-client';
import type { HttpModelClientOptions } from './http-model-client';
import { LanguageModelError } from './errors';
import type { ChatMessage } from '../language-model';
import type { ModelConfig } from '../../config/validator';

const GenerateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })) }).optional(),
      }),
    )
    .optional(),
});

interface GeminiContent {
  role: 'user' | 'model';
  parts: Array<{ text: string }>;
}

/** Google Gemini `generateContent` endpoint */
export class GeminiClient extends HttpModelClient {
  readonly name: string;

  constructor(config: ModelConfig, options: Partial<HttpModelClientOptions> = {}) {
    super(config, { ...options, baseURL: config.base_url ?? 'https://generativelanguage.googleapis.com/v1beta' });
    this.name = `gemini:${config.model}`;
  }

  protected async complete(messages: readonly ChatMessage[]): Promise<string> {
    const { system, contents } = toGeminiContents(messages);

    const { data } = await this.http.post<unknown>(
      `/models/${encodeURIComponent(this.config.model)}:generateContent`,
      {
        ...(system ? { systemInstruction: { parts: [{ text: system }] } } : {}),
        contents,
        generationConfig: { temperature: this.config.temperature, maxOutputTokens: this.config.max_tokens },
      },
      { params: { key: this.config.api_key } },
    );

    const parsed = GenerateContentSchema.safeParse(data);
    if (!parsed.success) {
      throw new LanguageModelError(`${this.name}: unexpected response shape`);
    }

    const parts = parsed.data.candidates?.[0]?.content?.parts ?? [];
    return parts.map((p) => p.text ?? '').join('');
  }
}

/** System messages become the system instruction; the rest alternate user/model */
export function toGeminiContents(messages: readonly ChatMessage[]): { system: string; contents: GeminiContent[] } {
  const system = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content)
    .join('\n\n');

  const contents = messages
    .filter((m) => m.role !== 'system')
    .map(
      (m): GeminiContent => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.role === 'tool' ? `[tool result]\n${m.content}` : m.content }],
      }),
    );

  return { system, contents };
}

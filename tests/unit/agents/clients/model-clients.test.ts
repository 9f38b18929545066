import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { createLanguageModel } from '../../../../src/agents/clients';
import { OpenAIChatClient } from '../../../../src/agents/clients/openai-client';
import { OllamaClient } from '../../../../src/agents/clients/ollama-client';
import { GeminiClient, toGeminiContents } from '../../../../src/agents/clients/gemini-client';
import { LanguageModelAuthError, LanguageModelError, LanguageModelRateLimitError } from '../../../../src/agents/clients/errors';
import type { ModelConfig } from '../../../../src/config/validator';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

const CONFIG: ModelConfig = {
  engine: 'openai',
  api_key: 'test-secret',
  model: 'gpt-4o-mini',
  temperature: 0.5,
  max_tokens: 256,
  timeout_ms: 1000,
  max_retries: 2,
};

describe('model clients', () => {
  const mockAxiosInstance = {
    post: jest.fn(),
    interceptors: {
      response: { use: jest.fn() },
    },
  };

  const errorInterceptor = (): ((error: unknown) => unknown) => {
    const handler: unknown = mockAxiosInstance.interceptors.response.use.mock.calls[0]?.[1];
    if (typeof handler !== 'function') throw new Error('no response interceptor registered');
    return (error) => handler(error);
  };

  const thrownBy = (fn: () => unknown): unknown => {
    try {
      fn();
    } catch (err) {
      return err;
    }
    return undefined;
  };

  beforeEach(() => {
    jest.clearAllMocks();
    mockedAxios.create.mockReturnValue(mockAxiosInstance as unknown as AxiosInstance);
  });

  describe('OpenAIChatClient', () => {
    it('posts the conversation and returns the completion text', async () => {
      mockAxiosInstance.post.mockResolvedValueOnce({ data: { choices: [{ message: { content: '{"tool": "finish"}' } }] } });
      const client = new OpenAIChatClient(CONFIG, { retryDelayMs: () => 0 });

      const text = await client.send([
        { role: 'system', content: 'be brief' },
        { role: 'tool', content: '{"ok":true}' },
      ]);

      expect(text).toBe('{"tool": "finish"}');
      expect(client.name).toBe('openai:gpt-4o-mini');
      expect(mockedAxios.create).toHaveBeenCalledWith({
        baseURL: 'https://api.openai.com/v1',
        timeout: 1000,
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
      });
      expect(mockAxiosInstance.post).toHaveBeenCalledWith('/chat/completions', {
        model: 'gpt-4o-mini',
        messages: [
          { role: 'system', content: 'be brief' },
          { role: 'user', content: '[tool result]\n{"ok":true}' },
        ],
        temperature: 0.5,
        max_tokens: 256,
      });
    });

    it('retries retryable failures', async () => {
      mockAxiosInstance.post
        .mockRejectedValueOnce(new LanguageModelError('openai: HTTP 503', 503, true))
        .mockResolvedValueOnce({ data: { choices: [{ message: { content: 'ok' } }] } });

      const text = await new OpenAIChatClient(CONFIG, { retryDelayMs: () => 0 }).send([{ role: 'user', content: 'hi' }]);

      expect(text).toBe('ok');
      expect(mockAxiosInstance.post).toHaveBeenCalledTimes(2);
    });

    it('does not retry authentication failures', async () => {
      mockAxiosInstance.post.mockRejectedValue(new LanguageModelAuthError('openai', 401));

      await expect(new OpenAIChatClient(CONFIG, { retryDelayMs: () => 0 }).send([{ role: 'user', content: 'hi' }])).rejects.toThrow(LanguageModelAuthError);
      expect(mockAxiosInstance.post).toHaveBeenCalledTimes(1);
    });

    it('treats empty completions as retryable and gives up after max_retries', async () => {
      mockAxiosInstance.post.mockResolvedValue({ data: { choices: [{ message: { content: '  ' } }] } });

      await expect(new OpenAIChatClient(CONFIG, { retryDelayMs: () => 0 }).send([{ role: 'user', content: 'hi' }])).rejects.toThrow('openai:gpt-4o-mini: empty completion');
      expect(mockAxiosInstance.post).toHaveBeenCalledTimes(3);
    });

    it('maps HTTP failures in the response interceptor', () => {
      new OpenAIChatClient(CONFIG);
      const intercept = errorInterceptor();

      expect(thrownBy(() => intercept({ response: { status: 401, statusText: 'Unauthorized', headers: {} } }))).toBeInstanceOf(LanguageModelAuthError);

      const limited = thrownBy(() => intercept({ response: { status: 429, statusText: '', headers: { 'retry-after': '2' } } }));
      expect(limited).toBeInstanceOf(LanguageModelRateLimitError);
      expect(limited instanceof LanguageModelRateLimitError && limited.retryAfterMs).toBe(2000);

      const unavailable = thrownBy(() => intercept({ response: { status: 503, statusText: 'Service Unavailable', headers: {} } }));
      expect(unavailable instanceof LanguageModelError && [unavailable.message, unavailable.retryable]).toEqual(['openai:gpt-4o-mini: HTTP 503 Service Unavailable', true]);

      const offline = thrownBy(() => intercept({ code: 'ECONNREFUSED', message: 'connect failed' }));
      expect(offline instanceof LanguageModelError && offline.message).toBe('openai:gpt-4o-mini: network error (ECONNREFUSED)');
    });

    it('targets OpenRouter for the openrouter engine', () => {
      const client = new OpenAIChatClient({ ...CONFIG, engine: 'openrouter', model: 'openai/gpt-4o-mini' });
      expect(client.name).toBe('openrouter:openai/gpt-4o-mini');
      expect(mockedAxios.create).toHaveBeenCalledWith(expect.objectContaining({ baseURL: 'https://openrouter.ai/api/v1' }));
    });
  });

  describe('OllamaClient', () => {
    it('accepts the chat endpoint as base URL', async () => {
      mockAxiosInstance.post.mockResolvedValueOnce({ data: { message: { content: 'hello' } } });
      const client = new OllamaClient({ ...CONFIG, engine: 'ollama', model: 'llama3.1', base_url: 'http://gpu-box:11434/api/chat' });

      expect(await client.send([{ role: 'user', content: 'hi' }])).toBe('hello');
      expect(mockedAxios.create).toHaveBeenCalledWith(expect.objectContaining({ baseURL: 'http://gpu-box:11434' }));
      expect(mockAxiosInstance.post).toHaveBeenCalledWith('/api/chat', expect.objectContaining({ model: 'llama3.1', stream: false }));
    });
  });

  describe('GeminiClient', () => {
    it('joins candidate parts', async () => {
      mockAxiosInstance.post.mockResolvedValueOnce({ data: { candidates: [{ content: { parts: [{ text: 'a' }, { text: 'b' }] } }] } });
      const client = new GeminiClient({ ...CONFIG, engine: 'gemini', model: 'gemini-2.0-flash' });

      expect(await client.send([{ role: 'user', content: 'hi' }])).toBe('ab');
      expect(mockAxiosInstance.post.mock.calls[0]?.[0]).toBe('/models/gemini-2.0-flash:generateContent');
    });

    it('moves system messages into the system instruction', () => {
      expect(
        toGeminiContents([
          { role: 'system', content: 'rules' },
          { role: 'user', content: 'goal' },
          { role: 'assistant', content: 'call' },
          { role: 'tool', content: 'result' },
        ]),
      ).toEqual({
        system: 'rules',
        contents: [
          { role: 'user', parts: [{ text: 'goal' }] },
          { role: 'model', parts: [{ text: 'call' }] },
          { role: 'user', parts: [{ text: '[tool result]\nresult' }] },
        ],
      });
    });
  });

  it('creates the client for the configured engine', () => {
    expect(createLanguageModel(CONFIG)).toBeInstanceOf(OpenAIChatClient);
    expect(createLanguageModel({ ...CONFIG, engine: 'gemini' })).toBeInstanceOf(GeminiClient);
    expect(createLanguageModel({ ...CONFIG, engine: 'ollama' })).toBeInstanceOf(OllamaClient);
  });
});

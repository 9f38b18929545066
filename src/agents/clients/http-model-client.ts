import axios, { AxiosError, AxiosInstance } from 'axios';
import type { ChatMessage, LanguageModel } from '../language-model';
import type { ModelConfig } from '../../config/validator';
import { LanguageModelAuthError, LanguageModelError, LanguageModelRateLimitError } from './errors';
import { backoffDelay, parseRetryAfter, sleep } from '../../utils/backoff';
import { silentLogger } from '../../utils/logger';
import type { Logger } from '../../utils/logger';

export interface HttpModelClientOptions {
  baseURL: string;
  headers?: Record<string, string>;
  logger?: Logger;
  /** Override the wait between retries (tests pass 0) */
  retryDelayMs?: (attempt: number) => number;
}

/**
 * Shared HTTP plumbing for model backends: one axios instance, HTTP failures
 * mapped to LanguageModelError subclasses, and retry with exponential backoff
 * on rate limits, 5xx responses and network errors.
 */
export abstract class HttpModelClient implements LanguageModel {
  abstract readonly name: string;
  protected http: AxiosInstance;
  protected logger: Logger;
  private retryDelayMs: (attempt: number) => number;

  constructor(
    protected config: ModelConfig,
    options: HttpModelClientOptions,
  ) {
    this.logger = options.logger ?? silentLogger;
    this.retryDelayMs = options.retryDelayMs ?? ((attempt) => backoffDelay(attempt));
    this.http = axios.create({
      baseURL: options.baseURL,
      timeout: config.timeout_ms,
      headers: { 'Content-Type': 'application/json', ...options.headers },
    });

    this.http.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        throw this.mapError(error);
      },
    );
  }

  async send(messages: readonly ChatMessage[]): Promise<string> {
    for (let attempt = 0; ; attempt++) {
      try {
        const text = await this.complete(messages);
        if (!text.trim()) {
          throw new LanguageModelError(`${this.name}: empty completion`, undefined, true);
        }
        return text;
      } catch (err) {
        const error = err instanceof LanguageModelError ? err : new LanguageModelError(`${this.name}: ${err instanceof Error ? err.message : String(err)}`, undefined, false, err);

        if (!error.retryable || attempt >= this.config.max_retries) throw error;

        const wait = error instanceof LanguageModelRateLimitError && error.retryAfterMs !== undefined ? error.retryAfterMs : this.retryDelayMs(attempt);
        this.logger.warn(`${this.name}: request failed, retrying`, { attempt: attempt + 1, maxRetries: this.config.max_retries, waitMs: wait, error: error.message });
        await sleep(wait);
      }
    }
  }

  /** Perform one request and return the completion text */
  protected abstract complete(messages: readonly ChatMessage[]): Promise<string>;

  private mapError(error: AxiosError): LanguageModelError {
    const response = error.response;
    if (!response) {
      return new LanguageModelError(`${this.name}: network error (${error.code ?? error.message})`, 0, true, error);
    }

    switch (response.status) {
      case 401:
      case 403:
        return new LanguageModelAuthError(this.name, response.status);
      case 429:
        return new LanguageModelRateLimitError(this.name, parseRetryAfter(response.headers['retry-after']));
      default:
        return new LanguageModelError(`${this.name}: HTTP ${response.status} ${response.statusText}`.trim(), response.status, response.status >= 500, error);
    }
  }
}

/** Backends without a tool role get tool results as user messages */
export function flattenToolRole(message: ChatMessage): { role: 'system' | 'user' | 'assistant'; content: string } {
  return message.role === 'tool' ? { role: 'user', content: `[tool result]\n${message.content}` } : { role: message.role, content: message.content };
}

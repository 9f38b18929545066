import { TaskPilotError } from '../../utils/errors';

export class LanguageModelError extends TaskPilotError {
  constructor(
    message: string,
    public status?: number,
    public retryable: boolean = false,
    originalError?: unknown,
  ) {
    super(message, 'MODEL_UNAVAILABLE', originalError);
    this.name = 'LanguageModelError';
  }
}

export class LanguageModelAuthError extends LanguageModelError {
  constructor(engine: string, status: number) {
    super(`${engine}: authentication failed (HTTP ${status}); check the API key`, status, false);
    this.name = 'LanguageModelAuthError';
  }
}

export class LanguageModelRateLimitError extends LanguageModelError {
  constructor(
    engine: string,
    public retryAfterMs?: number,
  ) {
    super(`${engine}: rate limit exceeded`, 429, true);
    this.name = 'LanguageModelRateLimitError';
  }
}

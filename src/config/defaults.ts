import type { Config, Engine } from './validator';

export const DEFAULT_MODELS: Record<Engine, string> = {
  openai: 'gpt-4o-mini',
  openrouter: 'openai/gpt-4o-mini',
  gemini: 'gemini-2.0-flash',
  ollama: 'llama3.1',
};

export const defaults: Config = {
  model: {
    engine: 'openai',
    model: DEFAULT_MODELS.openai,
    temperature: 0.5,
    max_tokens: 2048,
    timeout_ms: 60_000,
    max_retries: 3,
  },
  agent: {
    mode: 'confirm-each',
    step_limit: 100,
    max_response_attempts: 3,
    deep_analysis: true,
  },
  context: {
    max_messages: 20,
    max_tokens: 24_000,
  },
  execution: {
    local_timeout_ms: 120_000,
    remote_timeout_ms: 300_000,
  },
  security: {
    kill_switch: false,
    dangerous_patterns: [],
    caution_patterns: [],
  },
  web_search: {
    engine: 'duckduckgo',
    searxng_url: 'http://localhost:8888',
    max_iterations: 5,
    max_sources: 5,
    min_confidence: 0.7,
    timeout_ms: 30_000,
    max_content_length: 10_000,
  },
  logging: {
    level: 'warn',
  },
  storage: {
    root_dir: '.taskpilot',
  },
};

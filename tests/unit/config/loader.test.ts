import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigValidationError, deepMerge, loadConfig } from '../../../src/config/loader';

describe('loadConfig', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'config-loader-'));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  const writeYaml = (text: string): void => fs.writeFileSync(path.join(cwd, 'config.yaml'), text);

  it('applies defaults and reads the key for the default engine', () => {
    const config = loadConfig({}, { cwd, env: { OPENAI_API_KEY: 'test-secret' } });

    expect(config.model).toEqual({ engine: 'openai', api_key: 'test-secret', model: 'gpt-4o-mini', temperature: 0.5, max_tokens: 2048, timeout_ms: 60_000, max_retries: 3 });
    expect(config.agent).toEqual({ mode: 'confirm-each', step_limit: 100, max_response_attempts: 3, deep_analysis: true });
    expect(config.storage.root_dir).toBe('.taskpilot');
  });

  it('requires an API key for hosted engines', () => {
    expect(() => loadConfig({}, { cwd, env: {} })).toThrow(new ConfigValidationError(['model.api_key: API key is required for engine "openai"']).message);
  });

  it('runs ollama without a key', () => {
    const config = loadConfig({}, { cwd, env: { AI_ENGINE: 'ollama', OLLAMA_URL: 'http://localhost:11434' } });
    expect(config.model).toMatchObject({ engine: 'ollama', model: 'llama3.1', base_url: 'http://localhost:11434' });
    expect(config.model.api_key).toBeUndefined();
  });

  it('accepts google as the gemini engine', () => {
    const config = loadConfig({}, { cwd, env: { AI_ENGINE: 'Google', GOOGLE_API_KEY: 'test-secret' } });
    expect(config.model).toMatchObject({ engine: 'gemini', model: 'gemini-2.0-flash', api_key: 'test-secret' });
  });

  it('layers config.yaml, then environment, then CLI overrides', () => {
    writeYaml('model:\n  model: from-yaml\nagent:\n  step_limit: 20\n  mode: autonomous\n');

    const config = loadConfig({ agent: { step_limit: 7 } }, { cwd, env: { OPENAI_API_KEY: 'test-secret', OPENAI_MODEL: 'from-env' } });

    expect(config.model.model).toBe('from-env');
    expect(config.agent.mode).toBe('autonomous');
    expect(config.agent.step_limit).toBe(7);
  });

  it('lets the CLI engine win over the environment', () => {
    const config = loadConfig({ model: { engine: 'ollama' } }, { cwd, env: { AI_ENGINE: 'openai' } });
    expect(config.model.engine).toBe('ollama');
  });

  it('coerces numeric and flag variables', () => {
    const config = loadConfig({}, { cwd, env: { OPENAI_API_KEY: 'test-secret', OPENAI_TEMPERATURE: '0.2', TASKPILOT_KILL_SWITCH: 'yes', LOG_LEVEL: 'DEBUG' } });
    expect(config.model.temperature).toBe(0.2);
    expect(config.security.kill_switch).toBe(true);
    expect(config.logging.level).toBe('debug');
  });

  it('rejects unknown engines', () => {
    expect(() => loadConfig({}, { cwd, env: { AI_ENGINE: 'mystery' } })).toThrow('model.engine: unknown engine "mystery"');
  });

  it('reports every invalid value', () => {
    writeYaml('agent:\n  step_limit: -1\nweb_search:\n  min_confidence: 3\n');
    expect(() => loadConfig({}, { cwd, env: { OPENAI_API_KEY: 'test-secret' } })).toThrow(/agent\.step_limit: [\s\S]*web_search\.min_confidence: /);
  });
});

describe('deepMerge', () => {
  it('merges nested objects and skips undefined values', () => {
    const target: Record<string, unknown> = { a: { b: 1, c: 2 }, d: 'keep' };
    deepMerge(target, { a: { b: 3 }, d: undefined, e: [1] });
    expect(target).toEqual({ a: { b: 3, c: 2 }, d: 'keep', e: [1] });
  });
});

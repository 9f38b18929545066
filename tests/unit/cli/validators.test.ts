import { ValidationError, joinGoal, parseEngine, parseRemote, parseStepLimit, parseTimeoutSeconds } from '../../../src/cli/validators';

describe('CLI validators', () => {
  describe('parseStepLimit', () => {
    it('accepts positive integers', () => {
      expect(parseStepLimit(' 25 ')).toBe(25);
    });

    it.each(['0', '-3', '2.5', 'ten', '', '10001'])('rejects "%s"', (input) => {
      expect(() => parseStepLimit(input)).toThrow(ValidationError);
    });
  });

  describe('parseTimeoutSeconds', () => {
    it('converts seconds to milliseconds', () => {
      expect(parseTimeoutSeconds('90')).toBe(90_000);
      expect(parseTimeoutSeconds('1.5')).toBe(1500);
    });

    it('names the flag in the error', () => {
      expect(() => parseTimeoutSeconds('0', '--remote-timeout')).toThrow('Invalid --remote-timeout value: "0". Expected a positive number of seconds');
    });
  });

  describe('parseRemote', () => {
    it('parses user@host:port', () => {
      expect(parseRemote('deploy@web1:2222')).toEqual({ user: 'deploy', host: 'web1', port: 2222 });
    });

    it('wraps parse failures', () => {
      expect(() => parseRemote('web1')).toThrow(new ValidationError('Invalid remote target "web1". Expected user@host or user@host:port'));
    });
  });

  describe('parseEngine', () => {
    it('normalizes case and the google alias', () => {
      expect(parseEngine('OpenAI')).toBe('openai');
      expect(parseEngine('google')).toBe('gemini');
    });

    it('rejects unknown engines', () => {
      expect(() => parseEngine('mystery')).toThrow('Invalid engine: "mystery". Expected one of openai, openrouter, gemini, ollama');
    });
  });

  it('joins goal words', () => {
    expect(joinGoal(['install', 'nginx'])).toBe('install nginx');
    expect(joinGoal(undefined)).toBe('');
  });
});

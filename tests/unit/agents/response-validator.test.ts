import { ResponseValidator, parseToolInvocation } from '../../../src/agents/response-validator';
import type { ChatMessage, LanguageModel } from '../../../src/agents/language-model';
import { UnrecoverableResponseError } from '../../../src/orchestrator/errors';

describe('parseToolInvocation', () => {
  it('accepts the canonical form', () => {
    expect(parseToolInvocation('{"tool": "finish", "args": {"summary": "all done"}}')).toEqual({
      ok: true,
      invocation: { tool: 'finish', args: { summary: 'all done' } },
    });
  });

  it('accepts the flat form and tool aliases', () => {
    expect(parseToolInvocation('{"tool": "bash", "command": "ls -la"}')).toEqual({
      ok: true,
      invocation: { tool: 'execute_command', args: { command: 'ls -la' } },
    });
  });

  it('coerces numeric strings for plan steps', () => {
    expect(parseToolInvocation('{"tool": "update_plan_step", "arguments": {"step": "2", "status": "completed"}}')).toEqual({
      ok: true,
      invocation: { tool: 'update_plan_step', args: { step: 2, status: 'completed' } },
    });
  });

  it('unwraps a single-element list', () => {
    const outcome = parseToolInvocation('[{"tool": "ask_user", "args": {"question": "Which port?"}}]');
    expect(outcome).toEqual({ ok: true, invocation: { tool: 'ask_user', args: { question: 'Which port?' } } });
  });

  it('rejects several tool calls in one reply', () => {
    expect(parseToolInvocation('[{"tool": "finish"}, {"tool": "finish"}]')).toEqual({ ok: false, defect: 'Expected exactly one tool call per reply, got a list of 2' });
  });

  it('rejects an object without a tool name', () => {
    expect(parseToolInvocation('{"command": "ls"}')).toEqual({ ok: false, defect: 'The object has no "tool" field naming the tool to call' });
  });

  it('names unknown tools', () => {
    const outcome = parseToolInvocation('{"tool": "dance"}');
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.defect).toMatch(/^Unknown tool "dance"\. Valid tools: execute_command, read_file/);
  });

  it('reports missing arguments by path', () => {
    expect(parseToolInvocation('{"tool": "read_file", "args": {}}')).toEqual({ ok: false, defect: 'Invalid arguments for "read_file": args.path: Required' });
  });

  it('requires replace unless deleting a line', () => {
    expect(parseToolInvocation('{"tool": "edit_file", "args": {"path": "a", "action": "replace", "search": "x"}}')).toEqual({
      ok: false,
      defect: 'Invalid arguments for "edit_file": args.replace: replace is required unless action is delete_line',
    });
    expect(parseToolInvocation('{"tool": "edit_file", "args": {"path": "a", "action": "delete_line", "search": "x"}}').ok).toBe(true);
  });
});

describe('ResponseValidator', () => {
  let model: jest.Mocked<LanguageModel>;
  const conversation: ChatMessage[] = [{ role: 'user', content: 'Goal: list files' }];

  beforeEach(() => {
    model = { name: 'stub', send: jest.fn() };
  });

  it('returns the first valid reply without corrections', async () => {
    model.send.mockResolvedValueOnce('{"tool": "list_directory"}');
    const validator = new ResponseValidator(model);

    const response = await validator.obtain(conversation);

    expect(response).toEqual({ invocation: { tool: 'list_directory', args: { path: '.' } }, raw: '{"tool": "list_directory"}', attempts: 1 });
    expect(model.send).toHaveBeenCalledTimes(1);
  });

  it('sends a correction naming the defect and accepts the fixed reply', async () => {
    model.send.mockResolvedValueOnce('I will list the files now.').mockResolvedValueOnce('{"tool": "list_directory", "args": {"path": "/srv"}}');
    const validator = new ResponseValidator(model);

    const response = await validator.obtain(conversation);

    expect(response.attempts).toBe(2);
    expect(response.invocation).toEqual({ tool: 'list_directory', args: { path: '/srv' } });
    const correctionTurn = model.send.mock.calls[1]?.[0];
    expect(correctionTurn?.[1]).toEqual({ role: 'assistant', content: 'I will list the files now.' });
    expect(correctionTurn?.[2]?.content).toContain('ATTENTION: YOUR PREVIOUS REPLY (ATTEMPT 1/3) WAS NOT A VALID TOOL CALL.');
    expect(conversation).toHaveLength(1);
  });

  it('gives up after three model calls', async () => {
    model.send.mockResolvedValue('still not json');
    const validator = new ResponseValidator(model);

    await expect(validator.obtain(conversation)).rejects.toThrow(UnrecoverableResponseError);
    expect(model.send).toHaveBeenCalledTimes(3);
  });

  it('honours a custom attempt budget', async () => {
    model.send.mockResolvedValue('nope');
    const validator = new ResponseValidator(model, { maxAttempts: 1 });

    await expect(validator.obtain(conversation)).rejects.toThrow('Model failed to produce a valid response after 1 attempt(s)');
    expect(model.send).toHaveBeenCalledTimes(1);
    expect(validator.getMaxAttempts()).toBe(1);
  });
});

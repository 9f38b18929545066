/* eslint-disable @typescript-eslint/unbound-method */
/**
 * Integration tests for the session orchestrator.
 *
 * The real planner, validator, dispatcher, security gate and state machine
 * run end-to-end; the model replies from a script and every effect (shell,
 * files, web) is a jest double.
 */
import { Orchestrator } from '../../../src/orchestrator/orchestrator';
import type { OrchestratorOptions } from '../../../src/orchestrator/orchestrator';
import { SecurityGate } from '../../../src/orchestrator/security-gate';
import type { SessionRecorder } from '../../../src/orchestrator/session';
import type { UserInteraction } from '../../../src/orchestrator/interaction';
import type { PersistedSession } from '../../../src/orchestrator/states';
import type { ToolInvocation } from '../../../src/agents/tool-schemas';
import type { LanguageModel } from '../../../src/agents/language-model';
import type { ExecutionBackend } from '../../../src/execution/types';
import type { FileOperator } from '../../../src/files/types';
import type { WebSearcher } from '../../../src/agents/web-search-agent';

// ── Helpers ─────────────────────────────────────────────────────────────

const call = (invocation: ToolInvocation): string => JSON.stringify(invocation);

describe('Orchestrator (integration)', () => {
  let model: jest.Mocked<LanguageModel>;
  let interaction: jest.Mocked<UserInteraction>;
  let backend: jest.Mocked<ExecutionBackend>;
  let files: jest.Mocked<FileOperator>;
  let webSearch: jest.Mocked<WebSearcher>;
  let recorder: jest.Mocked<SessionRecorder>;
  let saved: PersistedSession[];

  /** Queue model replies in order: plan draft first, then one per execution step */
  const script = (...replies: string[]): void => {
    for (const reply of replies) model.send.mockResolvedValueOnce(reply);
  };

  const orchestrator = (overrides: Partial<OrchestratorOptions> = {}): Orchestrator =>
    new Orchestrator({
      model,
      interaction,
      tools: { backend, target: { kind: 'local' }, files, webSearch, securityGate: new SecurityGate(), commandTimeoutMs: 1000 },
      mode: 'autonomous',
      stepLimit: 20,
      runId: 'run-int',
      recorder,
      deepAnalysis: false,
      ...overrides,
    });

  beforeEach(() => {
    model = { name: 'scripted', send: jest.fn() };
    interaction = {
      confirm: jest.fn().mockResolvedValue({ approved: true }),
      ask: jest.fn(),
      reviewPlan: jest.fn().mockResolvedValue({ action: 'accept' }),
    };
    backend = { run: jest.fn().mockResolvedValue({ exitCode: 0, stdout: '', stderr: '', timedOut: false, interrupted: false, durationMs: 5 }) };
    files = { read: jest.fn(), write: jest.fn().mockResolvedValue({ path: '/work/hello.txt', bytes: 2 }), edit: jest.fn(), copy: jest.fn(), delete: jest.fn(), list: jest.fn().mockResolvedValue({ path: '/work', entries: [] }) };
    webSearch = { search: jest.fn() };
    saved = [];
    recorder = {
      save: jest.fn(async (record: PersistedSession) => {
        saved.push(record);
      }),
    };
  });

  it('finishes a one-step goal', async () => {
    script(
      '{"steps": [{"description": "Write the greeting file"}]}',
      call({ tool: 'write_file', args: { path: 'hello.txt', content: 'hi' } }),
      call({ tool: 'update_plan_step', args: { step: 1, status: 'completed', result: 'written' } }),
      call({ tool: 'finish', args: { summary: 'hello.txt created' } }),
    );
    const o = orchestrator();
    const steps: number[] = [];
    o.getEvents().on('invocation', (_invocation, step) => steps.push(step));

    const report = await o.run('Create hello.txt');

    expect(report).toMatchObject({
      runId: 'run-int',
      goal: 'Create hello.txt',
      status: 'finished',
      finalState: 'FINISHED',
      stepsUsed: 3,
      stepLimit: 20,
      progress: { completedCount: 1, total: 1, percentage: 100 },
      actionsAttempted: 2,
      actionsSucceeded: 2,
      summary: 'hello.txt created',
    });
    expect(report.abort).toBeUndefined();
    expect(steps).toEqual([1, 2, 3]);
    expect(files.write).toHaveBeenCalledWith('hello.txt', 'hi');
    expect(interaction.reviewPlan).not.toHaveBeenCalled();
    expect(saved[saved.length - 1]).toMatchObject({ currentState: 'FINISHED', summary: 'hello.txt created', history: ['PLAN_PENDING', 'PLAN_REVIEW', 'EXECUTING'] });
  });

  it('confirms only the dangerous command after switching to autonomous at plan review', async () => {
    interaction.reviewPlan.mockResolvedValueOnce({ action: 'accept', switchToAutonomous: true });
    script(
      '{"steps": [{"description": "Remove the build directory", "command": "rm -rf build"}, {"description": "List what is left"}]}',
      call({ tool: 'execute_command', args: { command: 'rm -rf build' } }),
      call({ tool: 'update_plan_step', args: { step: 1, status: 'completed' } }),
      call({ tool: 'execute_command', args: { command: 'ls' } }),
      call({ tool: 'update_plan_step', args: { step: 2, status: 'completed' } }),
      call({ tool: 'finish', args: { summary: 'cleaned' } }),
    );

    const report = await orchestrator({ mode: 'confirm-each' }).run('Clean the build output');

    expect(report.status).toBe('finished');
    expect(report.mode).toBe('autonomous');
    expect(interaction.reviewPlan).toHaveBeenCalledTimes(1);
    expect(interaction.confirm).toHaveBeenCalledTimes(1);
    expect(interaction.confirm.mock.calls[0]?.[0]).toMatchObject({ details: expect.arrayContaining(['rm -rf build']), offerAutonomous: false });
    expect(backend.run.mock.calls.map((c) => c[0])).toEqual(['rm -rf build', 'ls']);
  });

  it('aborts when the step limit is exhausted', async () => {
    script('["Inspect the directory"]');
    model.send.mockResolvedValue(call({ tool: 'list_directory', args: { path: '.' } }));

    const report = await orchestrator({ stepLimit: 3 }).run('Look around forever');

    expect(model.send).toHaveBeenCalledTimes(4);
    expect(report).toMatchObject({
      status: 'aborted',
      finalState: 'ABORTED',
      stepsUsed: 3,
      abort: { code: 'STEP_LIMIT_EXCEEDED', message: 'Step limit exceeded: the goal was not finished within 3 step(s)', stoppedAt: 'EXECUTING', activeStep: 1 },
    });
    expect(report.plan?.steps[0]).toMatchObject({ status: 'failed', result: 'Aborted: Step limit exceeded: the goal was not finished within 3 step(s)' });
    expect(saved[saved.length - 1]?.error?.code).toBe('STEP_LIMIT_EXCEEDED');
  });

  it('aborts after three unusable replies in one turn', async () => {
    script('["Do it"]', 'no idea', 'still prose', '{"tool": "teleport"}');

    const report = await orchestrator().run('Do the thing');

    expect(model.send).toHaveBeenCalledTimes(4);
    expect(report.abort?.code).toBe('UNRECOVERABLE_RESPONSE');
    expect(report.finalState).toBe('ABORTED');
  });

  it('revises the plan on request before executing', async () => {
    interaction.reviewPlan.mockResolvedValueOnce({ action: 'revise', feedback: 'use rsync' }).mockResolvedValueOnce({ action: 'accept' });
    script(
      '["Copy with cp"]',
      '["Copy with rsync"]',
      call({ tool: 'update_plan_step', args: { step: 1, status: 'skipped', result: 'already in sync' } }),
      call({ tool: 'finish', args: { summary: 'nothing to copy' } }),
    );

    const report = await orchestrator({ mode: 'confirm-each' }).run('Mirror the site');

    expect(report.status).toBe('finished');
    expect(report.plan?.steps[0]).toMatchObject({ description: 'Copy with rsync', status: 'skipped' });
    expect(interaction.reviewPlan).toHaveBeenCalledTimes(2);
    expect(saved.map((s) => s.currentState)).toContain('PLAN_REVIEW');
  });

  it('keeps going when finish is premature', async () => {
    script(
      '["Step one"]',
      call({ tool: 'finish', args: { summary: 'too early' } }),
      call({ tool: 'update_plan_step', args: { step: 1, status: 'completed' } }),
      call({ tool: 'finish', args: { summary: 'done' } }),
    );
    const o = orchestrator();
    const results: boolean[] = [];
    o.getEvents().on('result', (result) => results.push(result.success));

    const report = await o.run('Finish properly');

    expect(results).toEqual([false, true, true]);
    expect(report.summary).toBe('done');
  });

  it('continues a finished session with a new goal', async () => {
    script(
      '["First"]',
      call({ tool: 'update_plan_step', args: { step: 1, status: 'completed' } }),
      call({ tool: 'finish', args: { summary: 'first done' } }),
      '["Second"]',
      call({ tool: 'update_plan_step', args: { step: 1, status: 'completed' } }),
      call({ tool: 'finish', args: { summary: 'second done' } }),
    );
    const o = orchestrator();

    await o.run('Goal one');
    const report = await o.continueWith('Goal two');

    expect(report).toMatchObject({ goal: 'Goal two', status: 'finished', stepsUsed: 2, summary: 'second done' });
    expect(saved[saved.length - 1]?.goals).toEqual(['Goal one', 'Goal two']);
    const replanPrompt = model.send.mock.calls[3]?.[0][1]?.content ?? '';
    expect(replanPrompt).toContain('Previous goal: Goal one');
  });

  it('refuses to continue a session that did not finish', async () => {
    const o = orchestrator();
    await expect(o.continueWith('anything')).rejects.toThrow('A new goal can only follow a finished one');
  });
});

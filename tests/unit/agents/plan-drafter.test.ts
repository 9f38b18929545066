import { PlanDrafter } from '../../../src/agents/plan-drafter';
import type { LanguageModel } from '../../../src/agents/language-model';
import { PlanManager } from '../../../src/orchestrator/plan-manager';
import { UnrecoverableResponseError } from '../../../src/orchestrator/errors';

describe('PlanDrafter', () => {
  let model: jest.Mocked<LanguageModel>;
  const manager = new PlanManager(() => new Date('2026-04-01T00:00:00.000Z'));

  beforeEach(() => {
    model = { name: 'stub', send: jest.fn() };
  });

  it('drafts a plan from the first usable reply', async () => {
    model.send.mockResolvedValueOnce('{"steps": [{"description": "Check free space", "command": "df -h"}]}');
    const drafter = new PlanDrafter(model, manager, { target: 'ops@db1' });

    const plan = await drafter.draft('Report disk usage');

    expect(plan.steps).toEqual([{ id: 1, description: 'Check free space', command: 'df -h', status: 'pending' }]);
    const [system, user] = model.send.mock.calls[0]?.[0] ?? [];
    expect(system?.role).toBe('system');
    expect(user?.content).toContain('Report disk usage');
  });

  it('feeds a parse failure back to the model', async () => {
    model.send.mockResolvedValueOnce('').mockResolvedValueOnce('["Check free space"]');
    const drafter = new PlanDrafter(model, manager);

    const plan = await drafter.draft('Report disk usage');

    expect(plan.steps).toHaveLength(1);
    expect(model.send).toHaveBeenCalledTimes(2);
    const transcript = model.send.mock.calls[1]?.[0] ?? [];
    expect(transcript[3]?.content).toContain('ATTENTION: YOUR PREVIOUS PLAN (ATTEMPT 1/3) COULD NOT BE USED.\nProblem: Plan draft is empty');
  });

  it('gives up after the attempt budget', async () => {
    model.send.mockResolvedValue('');
    const drafter = new PlanDrafter(model, manager, { maxAttempts: 2 });

    await expect(drafter.draft('anything')).rejects.toThrow(new UnrecoverableResponseError(2, ['Plan draft is empty', 'Plan draft is empty']).message);
    expect(model.send).toHaveBeenCalledTimes(2);
  });

  it('propagates model failures untouched', async () => {
    model.send.mockRejectedValue(new Error('connection refused'));
    await expect(new PlanDrafter(model, manager).draft('g')).rejects.toThrow('connection refused');
  });

  it('revises a plan with the user feedback in the prompt', async () => {
    const original = manager.createPlan('Deploy app', '["Copy files", "Restart"]');
    model.send.mockResolvedValueOnce('["Build image", "Run container"]');

    const revised = await new PlanDrafter(model, manager).revise(original, 'use docker instead');

    expect(revised.steps.map((s) => s.description)).toEqual(['Build image', 'Run container']);
    expect(model.send.mock.calls[0]?.[0][1]?.content).toContain('use docker instead');
  });
});

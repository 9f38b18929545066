import { PlanManager, truncate } from '../../../src/orchestrator/plan-manager';
import type { Plan } from '../../../src/orchestrator/plan-manager';
import { InvalidTransitionError, PlanParseError, UnknownStepError } from '../../../src/orchestrator/errors';

const FIXED = new Date('2026-01-02T03:04:05.000Z');

describe('PlanManager', () => {
  let manager: PlanManager;

  beforeEach(() => {
    manager = new PlanManager(() => FIXED);
  });

  const twoStepPlan = (): Plan =>
    manager.createPlan('Install nginx', JSON.stringify({ steps: [{ description: 'Update index', command: 'apt-get update' }, { description: 'Install package' }] }));

  describe('createPlan', () => {
    it('numbers steps from 1 and starts them pending', () => {
      const plan = twoStepPlan();

      expect(plan.goal).toBe('Install nginx');
      expect(plan.createdAt).toBe('2026-01-02T03:04:05.000Z');
      expect(plan.steps).toEqual([
        { id: 1, description: 'Update index', command: 'apt-get update', status: 'pending' },
        { id: 2, description: 'Install package', status: 'pending' },
      ]);
    });

    it('accepts a fenced bare array of strings', () => {
      const plan = manager.createPlan('g', '```json\n["first", "second"]\n```');
      expect(plan.steps.map((s) => s.description)).toEqual(['first', 'second']);
    });

    it('falls back to a numbered list', () => {
      const plan = manager.createPlan('g', 'Plan\n1. Check disk\n2) Clean logs');
      expect(plan.steps.map((s) => s.description)).toEqual(['Check disk', 'Clean logs']);
    });

    it('rejects an empty draft', () => {
      expect(() => manager.createPlan('g', '   ')).toThrow('Plan draft is empty');
    });

    it('rejects a draft with no steps', () => {
      expect(() => manager.createPlan('g', '{"steps": []}')).toThrow('Plan draft contains no steps');
    });

    it('rejects a step with an empty description', () => {
      expect(() => manager.createPlan('g', '{"steps": [{"description": "  "}]}')).toThrow(PlanParseError);
    });
  });

  describe('updateStep', () => {
    it('moves pending to in_progress and stamps startedAt', () => {
      const plan = manager.updateStep(twoStepPlan(), 1, 'in_progress');
      expect(plan.steps[0]).toMatchObject({ status: 'in_progress', startedAt: '2026-01-02T03:04:05.000Z' });
    });

    it('records the result note on a terminal status', () => {
      const started = manager.updateStep(twoStepPlan(), 1, 'in_progress');
      const done = manager.updateStep(started, 1, 'completed', 'index refreshed');
      expect(done.steps[0]).toMatchObject({ status: 'completed', result: 'index refreshed', finishedAt: '2026-01-02T03:04:05.000Z' });
    });

    it('returns the same plan when the status does not change', () => {
      const plan = twoStepPlan();
      expect(manager.updateStep(plan, 2, 'pending')).toBe(plan);
    });

    it('rejects skipping in_progress', () => {
      expect(() => manager.updateStep(twoStepPlan(), 1, 'completed')).toThrow(InvalidTransitionError);
    });

    it('rejects leaving a terminal status', () => {
      const plan = manager.updateStep(manager.updateStep(twoStepPlan(), 1, 'in_progress'), 1, 'failed');
      expect(() => manager.updateStep(plan, 1, 'in_progress')).toThrow('Step 1 cannot move from "failed" to "in_progress"');
    });

    it('rejects an unknown step id', () => {
      expect(() => manager.updateStep(twoStepPlan(), 3, 'in_progress')).toThrow(UnknownStepError);
      expect(() => manager.updateStep(twoStepPlan(), 3, 'in_progress')).toThrow('Unknown plan step 3: the plan has steps 1..2');
    });
  });

  describe('progress', () => {
    it('counts completed steps and floors the percentage', () => {
      let plan = manager.createPlan('g', '["a", "b", "c"]');
      plan = manager.updateStep(manager.updateStep(plan, 1, 'in_progress'), 1, 'completed');

      expect(manager.progressSummary(plan)).toEqual({ completedCount: 1, total: 3, percentage: 33 });
      expect(manager.isComplete(plan)).toBe(false);
      expect(manager.unresolvedSteps(plan).map((s) => s.id)).toEqual([2, 3]);
      expect(manager.nextPendingStep(plan)?.id).toBe(2);
    });

    it('treats failed and skipped as resolved', () => {
      let plan = manager.createPlan('g', '["a", "b"]');
      plan = manager.updateStep(manager.updateStep(plan, 1, 'in_progress'), 1, 'failed');
      plan = manager.updateStep(manager.updateStep(plan, 2, 'in_progress'), 2, 'skipped');

      expect(manager.isComplete(plan)).toBe(true);
      expect(manager.statusCounts(plan)).toEqual({ pending: 0, in_progress: 0, completed: 0, failed: 1, skipped: 1 });
    });
  });

  describe('revise', () => {
    it('replaces the steps and keeps the creation time', () => {
      const original: Plan = { ...twoStepPlan(), createdAt: '2025-12-31T00:00:00.000Z' };
      const revised = manager.revise(original, 'use a container', '["Pull image", "Run container"]');

      expect(revised.createdAt).toBe('2025-12-31T00:00:00.000Z');
      expect(revised.steps.map((s) => s.description)).toEqual(['Pull image', 'Run container']);
    });

    it('requires feedback', () => {
      expect(() => manager.revise(twoStepPlan(), ' ', '["x"]')).toThrow('Revision feedback must not be empty');
    });
  });

  it('renders the plan with icons and progress', () => {
    const plan = manager.updateStep(twoStepPlan(), 1, 'in_progress');
    expect(manager.renderPlan(plan)).toBe(
      [
        'Current plan for goal: Install nginx',
        '⏳ 1. [in_progress] Update index',
        '   command: apt-get update',
        '⬜ 2. [pending] Install package',
        'Progress: 0/2 completed (0%), 0 failed, 0 skipped',
      ].join('\n'),
    );
  });

  it('truncates long text', () => {
    expect(truncate('abcdef', 3)).toBe('abc...');
    expect(truncate('abc', 3)).toBe('abc');
  });
});

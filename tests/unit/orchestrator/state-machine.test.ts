import { StateMachine, InvalidSessionTransitionError } from '../../../src/orchestrator/state-machine';
import type { StateChangeEvent } from '../../../src/orchestrator/events';
import type { Plan } from '../../../src/orchestrator/plan-manager';

const RUN_ID = 'test-run-123';

const plan = (statuses: Array<Plan['steps'][number]['status']>): Plan => ({
  goal: 'g',
  steps: statuses.map((status, i) => ({ id: i + 1, description: `step ${i + 1}`, status })),
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z',
});

describe('StateMachine', () => {
  let machine: StateMachine;

  beforeEach(() => {
    machine = new StateMachine(RUN_ID, { now: () => new Date('2026-01-01T00:00:00.000Z') });
  });

  describe('Core Transitions (Happy Path)', () => {
    it('starts in PLAN_PENDING', () => {
      expect(machine.getState()).toBe('PLAN_PENDING');
      expect(machine.getRunId()).toBe(RUN_ID);
    });

    it('walks planning, review, execution and finish', async () => {
      await machine.transition('PLAN_READY');
      await machine.transition('PLAN_ACCEPTED', { plan: plan(['pending']) });
      await machine.transition('FINISH', { plan: plan(['completed']) });

      expect(machine.getState()).toBe('FINISHED');
      expect(machine.getHistory()).toEqual(['PLAN_PENDING', 'PLAN_REVIEW', 'EXECUTING']);
      expect(machine.isTerminal()).toBe(true);
    });

    it('returns to PLAN_PENDING when a revision is requested', async () => {
      await machine.transition('PLAN_READY');
      await machine.transition('REVISION_REQUESTED');
      expect(machine.getState()).toBe('PLAN_PENDING');
    });

    it('emits a stateChange event for every transition', async () => {
      const seen: StateChangeEvent[] = [];
      machine.events.on('stateChange', (e: StateChangeEvent) => seen.push(e));

      await machine.transition('PLAN_READY');

      expect(seen).toEqual([{ from: 'PLAN_PENDING', to: 'PLAN_REVIEW', trigger: 'PLAN_READY', runId: RUN_ID, timestamp: '2026-01-01T00:00:00.000Z' }]);
    });
  });

  describe('Global Control Triggers', () => {
    it('allows ABORT from any non-terminal state', async () => {
      await machine.transition('PLAN_READY');
      await machine.transition('ABORT');
      expect(machine.getState()).toBe('ABORTED');
    });

    it('rejects ABORT once terminal', async () => {
      const aborted = new StateMachine(RUN_ID, { initialState: 'ABORTED' });
      expect(aborted.canTransition('ABORT')).toBe(false);
      await expect(aborted.transition('ABORT')).rejects.toThrow(InvalidSessionTransitionError);
    });

    it('allows CONTINUE only from FINISHED', async () => {
      const finished = new StateMachine(RUN_ID, { initialState: 'FINISHED' });
      await finished.transition('CONTINUE');
      expect(finished.getState()).toBe('PLAN_PENDING');

      await expect(machine.transition('CONTINUE')).rejects.toThrow('Invalid transition: trigger [CONTINUE] from state [PLAN_PENDING]: not allowed');
    });
  });

  describe('Guards', () => {
    it('refuses execution without a plan', async () => {
      await machine.transition('PLAN_READY');
      await expect(machine.transition('PLAN_ACCEPTED')).rejects.toThrow('rejected by the EXECUTING guard');
      expect(machine.getState()).toBe('PLAN_REVIEW');
    });

    it('refuses FINISH while a step is unresolved', async () => {
      const executing = new StateMachine(RUN_ID, { initialState: 'EXECUTING' });
      await expect(executing.transition('FINISH', { plan: plan(['completed', 'in_progress']) })).rejects.toThrow(InvalidSessionTransitionError);
      await executing.transition('FINISH', { plan: plan(['completed', 'skipped', 'failed']) });
      expect(executing.getState()).toBe('FINISHED');
    });

    it('uses injected guards', async () => {
      const guarded = new StateMachine(RUN_ID, { guards: { PLAN_REVIEW: async () => false } });
      await expect(guarded.transition('PLAN_READY')).rejects.toThrow('rejected by the PLAN_REVIEW guard');
    });
  });
});

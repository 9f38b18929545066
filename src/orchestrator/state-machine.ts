import { TERMINAL_STATES } from './states';
import type { SessionState } from './states';
import { transitions } from './transitions';
import type { Trigger } from './transitions';
import { StateMachineEvents } from './events';
import type { StateChangeEvent } from './events';
import { transitionGuards } from './guards';
import type { GuardContext, GuardFn } from './guards';
import { TaskPilotError } from '../utils/errors';

export class InvalidSessionTransitionError extends TaskPilotError {
  constructor(
    public state: SessionState,
    public trigger: Trigger,
    reason: string,
  ) {
    super(`Invalid transition: trigger [${trigger}] from state [${state}]: ${reason}`, 'INVALID_TRANSITION');
    this.name = 'InvalidSessionTransitionError';
  }
}

export interface StateMachineOptions {
  initialState?: SessionState;
  history?: SessionState[];
  guards?: Partial<Record<SessionState, GuardFn>>;
  now?: () => Date;
}

/**
 * Session lifecycle: PLAN_PENDING → PLAN_REVIEW → EXECUTING → FINISHED, with
 * ABORT reachable from every non-terminal state and CONTINUE re-entering
 * planning after a finished goal.
 */
export class StateMachine {
  private state: SessionState;
  private history: SessionState[];
  private guards: Partial<Record<SessionState, GuardFn>>;
  private now: () => Date;

  public events = new StateMachineEvents();

  constructor(
    private runId: string,
    options: StateMachineOptions = {},
  ) {
    this.state = options.initialState ?? 'PLAN_PENDING';
    this.history = [...(options.history ?? [])];
    this.guards = options.guards ?? transitionGuards;
    this.now = options.now ?? (() => new Date());
  }

  getState(): SessionState {
    return this.state;
  }

  getHistory(): SessionState[] {
    return [...this.history];
  }

  getRunId(): string {
    return this.runId;
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.includes(this.state);
  }

  canTransition(trigger: Trigger): boolean {
    return this.resolve(trigger) !== undefined;
  }

  async transition(trigger: Trigger, context: GuardContext = {}): Promise<StateChangeEvent> {
    const fromState = this.state;
    const nextState = this.resolve(trigger);

    if (!nextState) {
      throw new InvalidSessionTransitionError(fromState, trigger, 'not allowed');
    }

    const guard = this.guards[nextState];
    if (guard && !(await guard(context))) {
      throw new InvalidSessionTransitionError(fromState, trigger, `rejected by the ${nextState} guard`);
    }

    this.history.push(fromState);
    this.state = nextState;

    const event: StateChangeEvent = {
      from: fromState,
      to: nextState,
      trigger,
      runId: this.runId,
      timestamp: this.now().toISOString(),
    };
    this.events.emitTransition(event);
    return event;
  }

  private resolve(trigger: Trigger): SessionState | undefined {
    // ABORT is a global override for every live state
    if (trigger === 'ABORT') {
      return this.isTerminal() ? undefined : 'ABORTED';
    }
    return transitions[this.state][trigger];
  }
}

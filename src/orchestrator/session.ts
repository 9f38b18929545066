import crypto from 'crypto';
import { ContextManager } from './context-manager';
import { StateMachine } from './state-machine';
import type { Trigger } from './transitions';
import type { PersistedSession, SessionError, SessionState } from './states';
import type { Plan } from './plan-manager';
import type { ExecutionMode } from '../config/validator';
import type { ToolName } from '../agents/tool-schemas';
import type { ChatMessage } from '../agents/language-model';

export type ActionKind = 'command' | 'file' | 'search' | 'plan' | 'question';

export interface ActionRecord {
  kind: ActionKind;
  tool: ToolName;
  description: string;
  success: boolean;
  detail?: string;
  stepId?: number;
  timestamp: string;
}

/** Anything that can persist a session record (SessionStore, or a test double) */
export interface SessionRecorder {
  save(record: PersistedSession): Promise<void>;
}

/** Read-only copy of a session handed to analysis and reporting */
export interface SessionView {
  runId: string;
  goal: string;
  state: SessionState;
  mode: ExecutionMode;
  plan?: Plan;
  actions: ActionRecord[];
  transcript: ChatMessage[];
  stepCount: number;
  summary?: string;
}

export interface SessionOptions {
  goal: string;
  mode: ExecutionMode;
  stepLimit: number;
  /** Human-readable execution target, `local` or `user@host` */
  target?: string;
  runId?: string;
  context?: ContextManager;
  recorder?: SessionRecorder;
  now?: () => Date;
}

/**
 * Root aggregate of one run. The orchestrator is the only caller that
 * mutates it; every state transition and plan change is persisted.
 */
export class Session {
  readonly runId: string;
  readonly context: ContextManager;
  readonly machine: StateMachine;
  readonly target: string;
  readonly stepLimit: number;

  private _mode: ExecutionMode;
  private _goal: string;
  private goals: string[];
  private _plan?: Plan;
  private stepCounter = 0;
  private actionLog: ActionRecord[] = [];
  private _summary?: string;
  private _error?: SessionError;
  private recorder?: SessionRecorder;
  private now: () => Date;

  constructor(options: SessionOptions) {
    this.runId = options.runId ?? crypto.randomUUID();
    this.context = options.context ?? new ContextManager();
    this.target = options.target ?? 'local';
    this.stepLimit = options.stepLimit;
    this._mode = options.mode;
    this._goal = options.goal;
    this.goals = [options.goal];
    this.recorder = options.recorder;
    this.now = options.now ?? (() => new Date());
    this.machine = new StateMachine(this.runId, { now: this.now });
  }

  get mode(): ExecutionMode {
    return this._mode;
  }

  get goal(): string {
    return this._goal;
  }

  get plan(): Plan | undefined {
    return this._plan;
  }

  get stepCount(): number {
    return this.stepCounter;
  }

  get state(): SessionState {
    return this.machine.getState();
  }

  get summary(): string | undefined {
    return this._summary;
  }

  get error(): SessionError | undefined {
    return this._error;
  }

  get actions(): readonly ActionRecord[] {
    return this.actionLog;
  }

  isTerminal(): boolean {
    return this.machine.isTerminal();
  }

  /** One-way: nothing switches a session back to confirm-each. Returns true when the mode changed. */
  switchToAutonomous(): boolean {
    if (this._mode === 'autonomous') return false;
    this._mode = 'autonomous';
    return true;
  }

  /** Advance the step counter and return the new value */
  nextStep(): number {
    this.stepCounter++;
    return this.stepCounter;
  }

  async setPlan(plan: Plan): Promise<void> {
    this._plan = plan;
    await this.persist();
  }

  recordAction(action: Omit<ActionRecord, 'timestamp'>): ActionRecord {
    const record: ActionRecord = { ...action, timestamp: this.now().toISOString() };
    this.actionLog.push(record);
    return record;
  }

  async transition(trigger: Trigger): Promise<void> {
    await this.machine.transition(trigger, { plan: this._plan });
    await this.persist();
  }

  async finish(summary: string): Promise<void> {
    this._summary = summary;
    await this.transition('FINISH');
  }

  async abort(error: SessionError): Promise<void> {
    this._error = error;
    await this.transition('ABORT');
  }

  /** Re-enter planning for a new goal on the retained context */
  async continueWith(goal: string): Promise<void> {
    await this.machine.transition('CONTINUE', { plan: this._plan });
    this._goal = goal;
    this.goals.push(goal);
    this.stepCounter = 0;
    this._plan = undefined;
    this._summary = undefined;
    this.context.setPlanSnapshot(undefined);
    await this.persist();
  }

  toView(): SessionView {
    return {
      runId: this.runId,
      goal: this._goal,
      state: this.state,
      mode: this._mode,
      plan: this._plan,
      actions: this.actionLog.map((a) => ({ ...a })),
      transcript: this.context.snapshot(),
      stepCount: this.stepCounter,
      summary: this._summary,
    };
  }

  toRecord(): PersistedSession {
    return {
      runId: this.runId,
      currentState: this.state,
      updatedAt: this.now().toISOString(),
      goal: this._goal,
      goals: [...this.goals],
      mode: this._mode,
      target: this.target,
      stepCount: this.stepCounter,
      stepLimit: this.stepLimit,
      plan: this._plan ?? null,
      history: this.machine.getHistory(),
      ...(this._summary ? { summary: this._summary } : {}),
      ...(this._error ? { error: this._error } : {}),
    };
  }

  private async persist(): Promise<void> {
    if (this.recorder) await this.recorder.save(this.toRecord());
  }
}

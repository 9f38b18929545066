import crypto from 'crypto';
import { Session } from './session';
import type { SessionRecorder } from './session';
import { SessionStore } from './state-store';
import type { SessionState } from './states';
import { ContextManager } from './context-manager';
import type { ContextWindowOptions } from './context-manager';
import { PlanManager } from './plan-manager';
import type { Plan, PlanProgress } from './plan-manager';
import { ToolDispatcher, renderToolResult } from './tool-dispatcher';
import type { ToolEnvironment } from './tool-dispatcher';
import { RecoveryManager } from './recovery';
import type { AbortReason } from './recovery';
import { SessionEvents } from './events';
import { StepLimitExceededError } from './errors';
import type { UserInteraction } from './interaction';
import { ResponseValidator } from '../agents/response-validator';
import { PlanDrafter } from '../agents/plan-drafter';
import { DeepAnalysisAgent } from '../agents/deep-analysis-agent';
import type { AnalysisReport, SessionAnalyst } from '../agents/deep-analysis-agent';
import type { LanguageModel } from '../agents/language-model';
import { buildSystemPrompt } from '../agents/prompts/system-prompt';
import type { ExecutionMode } from '../config/validator';
import { TaskPilotError, errorMessage } from '../utils/errors';
import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

// ── Options ─────────────────────────────────────────────────────────────

export interface OrchestratorOptions {
  model: LanguageModel;
  interaction: UserInteraction;
  tools: ToolEnvironment;
  mode: ExecutionMode;
  stepLimit: number;
  /** Model calls per turn before the reply is unrecoverable (default: 3) */
  maxResponseAttempts?: number;
  contextWindow?: ContextWindowOptions;
  /** `local` or `user@host[:port]`, shown to the model and the user */
  target?: string;
  /** Commands run as root on the target */
  isRoot?: boolean;
  cwd?: string;
  /** Overrides the generated system prompt */
  systemPrompt?: string;
  runId?: string;
  /** Directory holding `<runId>/session.json` (default: .taskpilot) */
  storageRoot?: string;
  /** Replaces the on-disk session store */
  recorder?: SessionRecorder;
  /** Run the analysis sub-agent after a finished goal (default: true) */
  deepAnalysis?: boolean;
  analyst?: SessionAnalyst;
  events?: SessionEvents;
  logger?: Logger;
}

// ── Result ──────────────────────────────────────────────────────────────

export interface AbortDetails extends AbortReason {
  /** State the session was in when it stopped */
  stoppedAt: SessionState;
  /** Plan step that was active when it stopped */
  activeStep?: number;
}

export interface SessionReport {
  runId: string;
  goal: string;
  status: 'finished' | 'aborted';
  finalState: SessionState;
  mode: ExecutionMode;
  stepsUsed: number;
  stepLimit: number;
  plan?: Plan;
  progress?: PlanProgress;
  actionsAttempted: number;
  actionsSucceeded: number;
  summary?: string;
  abort?: AbortDetails;
  analysis?: AnalysisReport;
  durationMs: number;
}

// ── Orchestrator ────────────────────────────────────────────────────────

/**
 * Drives one session: plan, review, then the execution loop of model turn →
 * validated tool call → dispatch → tool result, until `finish` passes or the
 * session aborts. A finished session can continue with a new goal.
 */
export class Orchestrator {
  private session?: Session;
  private controller?: AbortController;
  private lastAbort?: AbortDetails;
  private readonly planManager = new PlanManager();
  private readonly recovery = new RecoveryManager();
  private readonly validator: ResponseValidator;
  private readonly drafter: PlanDrafter;
  private readonly dispatcher: ToolDispatcher;
  private readonly analyst?: SessionAnalyst;
  private readonly events: SessionEvents;
  private readonly logger: Logger;
  private readonly target: string;

  constructor(private options: OrchestratorOptions) {
    this.logger = options.logger ?? silentLogger;
    this.events = options.events ?? new SessionEvents();
    this.target = options.target ?? 'local';
    this.validator = new ResponseValidator(options.model, { maxAttempts: options.maxResponseAttempts, logger: this.logger });
    this.drafter = new PlanDrafter(options.model, this.planManager, { maxAttempts: options.maxResponseAttempts, target: this.target, logger: this.logger });
    this.dispatcher = new ToolDispatcher({
      ...options.tools,
      interaction: options.interaction,
      planManager: this.planManager,
      events: this.events,
      logger: this.logger,
    });
    if (options.deepAnalysis !== false) {
      this.analyst = options.analyst ?? new DeepAnalysisAgent(options.model, this.planManager, this.logger);
    }
  }

  // ── Public API ──────────────────────────────────────────────────────

  getSession(): Session | undefined {
    return this.session;
  }

  getEvents(): SessionEvents {
    return this.events;
  }

  /** Start a new session for the goal */
  async run(goal: string): Promise<SessionReport> {
    const runId = this.options.runId ?? crypto.randomUUID();
    const session = new Session({
      runId,
      goal,
      mode: this.options.mode,
      stepLimit: this.options.stepLimit,
      target: this.target,
      context: new ContextManager(this.options.contextWindow),
      recorder: this.options.recorder ?? SessionStore.forRun(this.options.storageRoot ?? '.taskpilot', runId),
    });
    this.session = session;

    session.machine.events.on('stateChange', (event) => {
      this.logger.info('State transition', { from: event.from, to: event.to, trigger: event.trigger });
    });
    session.context.pin(
      'system',
      this.options.systemPrompt ?? buildSystemPrompt({ target: this.target, isRoot: this.options.isRoot, cwd: this.options.cwd }),
    );

    this.logger.info('Starting session', { runId, mode: session.mode, stepLimit: session.stepLimit, target: this.target });
    return this.drive(session);
  }

  /** Plan and execute a new goal on the context of a finished session */
  async continueWith(goal: string): Promise<SessionReport> {
    const session = this.session;
    if (!session || session.state !== 'FINISHED') {
      throw new TaskPilotError('A new goal can only follow a finished one', 'INVALID_CONTINUE');
    }

    const background = this.describeFinishedGoal(session);
    await session.continueWith(goal);
    this.logger.info('Continuing session with a new goal', { runId: session.runId });
    return this.drive(session, background);
  }

  /** Cancel the blocking operation in flight. Returns false when nothing was waiting. */
  interrupt(): boolean {
    const controller = this.controller;
    if (!controller || controller.signal.aborted) return false;
    controller.abort();
    return true;
  }

  // ── Phases ──────────────────────────────────────────────────────────

  private async drive(session: Session, background?: string): Promise<SessionReport> {
    const startedAt = Date.now();
    const firstAction = session.actions.length;
    this.lastAbort = undefined;
    session.context.pin('user', `Goal: ${session.goal}`);

    try {
      await this.planPhase(session, background);
      await this.executeLoop(session);
    } catch (err) {
      await this.abort(session, err);
    }

    const analysis = session.state === 'FINISHED' ? await this.analyze(session) : undefined;
    return this.buildResult(session, startedAt, firstAction, analysis);
  }

  private async planPhase(session: Session, background?: string): Promise<void> {
    let plan = await this.drafter.draft(session.goal, background);
    await this.publishPlan(session, plan);
    await session.transition('PLAN_READY');

    while (session.mode === 'confirm-each') {
      const current = plan;
      const decision = await this.blocking((signal) => this.options.interaction.reviewPlan(current, this.planManager.renderPlan(current), signal));

      if (decision.action === 'accept') {
        if (decision.switchToAutonomous) this.switchToAutonomous(session);
        break;
      }

      await session.transition('REVISION_REQUESTED');
      plan = await this.drafter.revise(plan, decision.feedback);
      await this.publishPlan(session, plan);
      await session.transition('PLAN_READY');
    }

    await session.transition('PLAN_ACCEPTED');
  }

  private async executeLoop(session: Session): Promise<void> {
    while (session.state === 'EXECUTING') {
      const step = session.nextStep();
      if (step > session.stepLimit) {
        throw new StepLimitExceededError(session.stepLimit);
      }

      const plan = session.plan;
      session.context.setPlanSnapshot(plan ? this.planManager.renderPlan(plan) : undefined);
      const evicted = session.context.enforceWindow();
      if (evicted > 0) this.logger.debug('Context window trimmed', { ...session.context.getMetrics() });

      const response = await this.validator.obtain(session.context.snapshot());
      session.context.append({ role: 'assistant', content: response.raw, payload: response.invocation });
      this.events.emitInvocation(response.invocation, step);

      const outcome = await this.blocking((signal) => this.dispatcher.dispatch(response.invocation, session, signal));
      session.context.append({ role: 'tool', content: renderToolResult(outcome.result), payload: outcome.result });
      this.events.emitResult(outcome.result);
      if (session.plan && session.plan !== plan) this.events.emitPlan(session.plan);

      if (outcome.finished) {
        await session.finish(outcome.summary ?? '');
        this.logger.info('Goal finished', { steps: step });
      }
    }
  }

  private async abort(session: Session, error: unknown): Promise<void> {
    const reason = this.recovery.classify(error);
    const active = session.plan ? this.planManager.activeStep(session.plan) : undefined;
    this.lastAbort = { ...reason, stoppedAt: session.state, ...(active ? { activeStep: active.id } : {}) };
    this.logger.error('Session aborted', { code: reason.code, message: reason.message, state: session.state });

    if (session.isTerminal()) return;

    try {
      await this.dispatcher.failActiveStep(session, `Aborted: ${reason.message}`);
    } catch (err) {
      this.logger.error('Could not mark the active step failed', { error: errorMessage(err) });
    }
    try {
      await session.abort({ code: reason.code, message: reason.message, ...(reason.details ? { details: reason.details } : {}) });
    } catch (err) {
      this.logger.error('Could not record the aborted session', { error: errorMessage(err) });
    }
  }

  private async analyze(session: Session): Promise<AnalysisReport | undefined> {
    if (!this.analyst) return undefined;
    try {
      return await this.analyst.analyze(session.toView());
    } catch (err) {
      this.logger.warn('Deep analysis failed', { error: errorMessage(err) });
      return undefined;
    }
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  /** Run an operation the user can cancel with interrupt() */
  private async blocking<T>(operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    this.controller = controller;
    try {
      return await operation(controller.signal);
    } finally {
      if (this.controller === controller) this.controller = undefined;
    }
  }

  private async publishPlan(session: Session, plan: Plan): Promise<void> {
    await session.setPlan(plan);
    this.events.emitPlan(plan);
  }

  private switchToAutonomous(session: Session): void {
    if (session.switchToAutonomous()) {
      this.logger.info('Switched to autonomous mode');
      this.events.emitModeChange(session.mode);
    }
  }

  private describeFinishedGoal(session: Session): string {
    const lines = [`Previous goal: ${session.goal}`];
    if (session.plan) lines.push(this.planManager.renderPlan(session.plan));
    if (session.summary) lines.push(`Summary: ${session.summary}`);
    return lines.join('\n');
  }

  private buildResult(session: Session, startedAt: number, firstAction: number, analysis?: AnalysisReport): SessionReport {
    const plan = session.plan;
    const actions = session.actions.slice(firstAction);
    const finished = session.state === 'FINISHED';

    return {
      runId: session.runId,
      goal: session.goal,
      status: finished ? 'finished' : 'aborted',
      finalState: session.state,
      mode: session.mode,
      stepsUsed: Math.min(session.stepCount, session.stepLimit),
      stepLimit: session.stepLimit,
      ...(plan ? { plan, progress: this.planManager.progressSummary(plan) } : {}),
      actionsAttempted: actions.length,
      actionsSucceeded: actions.filter((a) => a.success).length,
      ...(session.summary ? { summary: session.summary } : {}),
      ...(!finished && this.lastAbort ? { abort: this.lastAbort } : {}),
      ...(analysis ? { analysis } : {}),
      durationMs: Date.now() - startedAt,
    };
  }
}

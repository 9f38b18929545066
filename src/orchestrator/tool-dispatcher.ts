import { PlanManager, isTerminal, truncate } from './plan-manager';
import { IncompletePlanError, InteractionInterruptedError, InvalidTransitionError, UnknownStepError } from './errors';
import type { SecurityGate } from './security-gate';
import type { ConfirmationRequest, UserInteraction } from './interaction';
import type { SessionEvents } from './events';
import type { ActionKind, Session } from './session';
import type { ToolArgs, ToolInvocation, ToolName } from '../agents/tool-schemas';
import type { WebSearcher } from '../agents/web-search-agent';
import type { ExecutionBackend, ExecutionTarget, CommandResult } from '../execution/types';
import type { FileOperator } from '../files/types';
import { FileOperationError } from '../files/errors';
import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

// ── Types ───────────────────────────────────────────────────────────────

export interface ToolResult {
  tool: ToolName;
  success: boolean;
  payload?: Record<string, unknown>;
  error?: string;
  refused?: boolean;
  blocked?: boolean;
  timedOut?: boolean;
  interrupted?: boolean;
}

export interface DispatchOutcome {
  result: ToolResult;
  /** Set when a `finish` call passed the Finish Guard */
  finished?: boolean;
  summary?: string;
}

/** Collaborators the tools act through */
export interface ToolEnvironment {
  backend: ExecutionBackend;
  target: ExecutionTarget;
  files: FileOperator;
  webSearch: WebSearcher;
  securityGate: SecurityGate;
  /** Per-command timeout for the current target */
  commandTimeoutMs: number;
}

export interface ToolDispatcherOptions extends ToolEnvironment {
  interaction: UserInteraction;
  planManager?: PlanManager;
  events?: SessionEvents;
  logger?: Logger;
}

const OUTPUT_PREVIEW_CHARS = 4000;
const READ_CONTENT_CHARS = 20_000;
const WRITE_PREVIEW_LINES = 20;
const LIST_MAX_ENTRIES = 500;
const SOURCE_CONTENT_CHARS = 1500;
const RESULT_MESSAGE_CHARS = 12_000;
const INTERRUPTED_NOTE = 'Interrupted by user';

// ── Dispatcher ──────────────────────────────────────────────────────────

/**
 * Executes one validated tool invocation against the session. Confirmation,
 * security classification and plan bookkeeping happen here; the effect itself
 * is delegated to the backend, file operator or search agent.
 */
export class ToolDispatcher {
  private planManager: PlanManager;
  private logger: Logger;

  constructor(private options: ToolDispatcherOptions) {
    this.planManager = options.planManager ?? new PlanManager();
    this.logger = options.logger ?? silentLogger;
  }

  async dispatch(invocation: ToolInvocation, session: Session, signal?: AbortSignal): Promise<DispatchOutcome> {
    this.logger.debug('Dispatching tool call', { tool: invocation.tool, mode: session.mode });

    try {
      return await this.route(invocation, session, signal);
    } catch (err) {
      if (!(err instanceof InteractionInterruptedError)) throw err;

      const failedStep = await this.failCurrentStep(session, INTERRUPTED_NOTE);
      return {
        result: {
          tool: invocation.tool,
          success: false,
          interrupted: true,
          error: failedStep === undefined ? INTERRUPTED_NOTE : `${INTERRUPTED_NOTE}; plan step ${failedStep} was marked failed`,
        },
      };
    }
  }

  /** Mark the in-progress step failed, if there is one */
  async failActiveStep(session: Session, note: string): Promise<void> {
    const plan = session.plan;
    const active = plan ? this.planManager.activeStep(plan) : undefined;
    if (plan && active) {
      await session.setPlan(this.planManager.updateStep(plan, active.id, 'failed', note));
    }
  }

  /**
   * Fail the step the interrupted action belonged to: the active one, or the
   * next pending one when the interrupt came before it started.
   */
  private async failCurrentStep(session: Session, note: string): Promise<number | undefined> {
    const stepId = await this.startStepIfIdle(session);
    if (stepId !== undefined) await this.failActiveStep(session, note);
    return stepId;
  }

  private route(invocation: ToolInvocation, session: Session, signal?: AbortSignal): Promise<DispatchOutcome> {
    switch (invocation.tool) {
      case 'execute_command':
        return this.executeCommand(invocation.args, session, signal);
      case 'read_file':
        return this.readFile(invocation.args, session, signal);
      case 'write_file':
        return this.writeFile(invocation.args, session, signal);
      case 'edit_file':
        return this.editFile(invocation.args, session, signal);
      case 'copy_file':
        return this.copyFile(invocation.args, session, signal);
      case 'delete_file':
        return this.deleteFile(invocation.args, session, signal);
      case 'list_directory':
        return this.listDirectory(invocation.args, session);
      case 'web_search':
        return this.webSearch(invocation.args, session, signal);
      case 'update_plan_step':
        return this.updatePlanStep(invocation.args, session);
      case 'ask_user':
        return this.askUser(invocation.args, session, signal);
      case 'finish':
        return this.finish(invocation.args, session);
      default: {
        const unhandled: never = invocation;
        throw new Error(`Unhandled tool call: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  // ── Commands ──────────────────────────────────────────────────────────

  private async executeCommand(args: ToolArgs<'execute_command'>, session: Session, signal?: AbortSignal): Promise<DispatchOutcome> {
    const tool = 'execute_command';
    const { command } = args;
    const verdict = this.options.securityGate.classify(command);
    const decision = this.options.securityGate.decide(verdict, session.mode);

    if (decision === 'reject') {
      session.recordAction({ kind: 'command', tool, description: command, success: false, detail: verdict.rationale });
      return { result: { tool, success: false, blocked: true, error: `Command blocked: ${verdict.rationale}` } };
    }

    const refusal = await this.confirm(
      session,
      'command',
      {
        tool,
        title: 'Run command',
        details: [command, ...(args.explain ? [`Why: ${args.explain}`] : []), `Target: ${session.target}`, `Risk: ${verdict.tier} (${verdict.rationale})`],
        verdict,
        offerAutonomous: verdict.tier !== 'dangerous',
      },
      decision === 'confirm',
      signal,
    );
    if (refusal) return { result: refusal };

    const stepId = await this.startStepIfIdle(session);
    const outcome = await this.options.backend.run(command, {
      timeoutMs: this.options.commandTimeoutMs,
      target: this.options.target,
      signal,
    });
    const payload = commandPayload(command, outcome);

    if (outcome.interrupted) {
      await this.failActiveStep(session, INTERRUPTED_NOTE);
      session.recordAction({ kind: 'command', tool, description: command, success: false, detail: 'interrupted', stepId });
      return {
        result: {
          tool,
          success: false,
          interrupted: true,
          payload,
          error: `Command '${command}' was interrupted by the user${stepId === undefined ? '' : `; plan step ${stepId} was marked failed`}`,
        },
      };
    }

    if (outcome.timedOut) {
      const seconds = Math.round(this.options.commandTimeoutMs / 1000);
      const error = `Command '${command}' timed out after ${seconds}s`;
      session.recordAction({ kind: 'command', tool, description: command, success: false, detail: error, stepId });
      return { result: { tool, success: false, timedOut: true, payload, error } };
    }

    const success = outcome.exitCode === 0;
    session.recordAction({ kind: 'command', tool, description: command, success, detail: payload.message, stepId });
    return { result: success ? { tool, success, payload } : { tool, success, payload, error: payload.message } };
  }

  // ── Files ─────────────────────────────────────────────────────────────

  private async readFile(args: ToolArgs<'read_file'>, session: Session, signal?: AbortSignal): Promise<DispatchOutcome> {
    const range = args.start_line || args.end_line ? ` (lines ${args.start_line ?? 1}-${args.end_line ?? 'end'})` : '';
    const refusal = await this.confirm(
      session,
      'file',
      { tool: 'read_file', title: 'Read file', details: [`Path: ${args.path}${range}`], offerAutonomous: true },
      session.mode === 'confirm-each',
      signal,
    );
    if (refusal) return { result: refusal };

    return this.fileEffect(
      session,
      'read_file',
      `read ${args.path}${range}`,
      () => this.options.files.read(args.path, { startLine: args.start_line, endLine: args.end_line }),
      (read) => ({
        path: read.path,
        startLine: read.startLine,
        endLine: read.endLine,
        totalLines: read.totalLines,
        content: truncate(read.content, READ_CONTENT_CHARS),
      }),
    );
  }

  private async writeFile(args: ToolArgs<'write_file'>, session: Session, signal?: AbortSignal): Promise<DispatchOutcome> {
    const lines = args.content.split('\n');
    const preview = lines.slice(0, WRITE_PREVIEW_LINES);
    if (lines.length > WRITE_PREVIEW_LINES) preview.push(`... (${lines.length - WRITE_PREVIEW_LINES} more line(s))`);

    const refusal = await this.confirm(
      session,
      'file',
      { tool: 'write_file', title: 'Write file', details: [`Path: ${args.path}`, `${lines.length} line(s), ${args.content.length} char(s)`, ...preview], offerAutonomous: true },
      session.mode === 'confirm-each',
      signal,
    );
    if (refusal) return { result: refusal };

    return this.fileEffect(
      session,
      'write_file',
      `write ${args.path}`,
      () => this.options.files.write(args.path, args.content),
      (written) => ({ path: written.path, bytes: written.bytes }),
    );
  }

  private async editFile(args: ToolArgs<'edit_file'>, session: Session, signal?: AbortSignal): Promise<DispatchOutcome> {
    const details = [`Path: ${args.path}`, `Action: ${args.action}`, `Search: ${args.search}`];
    if (args.replace !== undefined) details.push(`Replace: ${args.replace}`);

    const refusal = await this.confirm(session, 'file', { tool: 'edit_file', title: 'Edit file', details, offerAutonomous: true }, session.mode === 'confirm-each', signal);
    if (refusal) return { result: refusal };

    return this.fileEffect(
      session,
      'edit_file',
      `${args.action} in ${args.path}`,
      () => this.options.files.edit(args.path, { action: args.action, search: args.search, replace: args.replace }),
      (edited) => ({ path: edited.path, action: args.action, matches: edited.matches }),
    );
  }

  private async copyFile(args: ToolArgs<'copy_file'>, session: Session, signal?: AbortSignal): Promise<DispatchOutcome> {
    const refusal = await this.confirm(
      session,
      'file',
      {
        tool: 'copy_file',
        title: 'Copy file',
        details: [`From: ${args.source}`, `To: ${args.destination}`, ...(args.overwrite ? ['Overwrites the destination if it exists'] : [])],
        offerAutonomous: true,
      },
      session.mode === 'confirm-each',
      signal,
    );
    if (refusal) return { result: refusal };

    return this.fileEffect(
      session,
      'copy_file',
      `copy ${args.source} to ${args.destination}`,
      () => this.options.files.copy(args.source, args.destination, { overwrite: args.overwrite }),
      (copied) => ({ source: copied.source, destination: copied.destination }),
    );
  }

  private async deleteFile(args: ToolArgs<'delete_file'>, session: Session, signal?: AbortSignal): Promise<DispatchOutcome> {
    const refusal = await this.confirm(
      session,
      'file',
      { tool: 'delete_file', title: 'Delete file', details: [`Path: ${args.path}`, args.backup ? 'A timestamped backup is kept' : 'No backup is kept'], offerAutonomous: true },
      session.mode === 'confirm-each',
      signal,
    );
    if (refusal) return { result: refusal };

    return this.fileEffect(
      session,
      'delete_file',
      `delete ${args.path}`,
      () => this.options.files.delete(args.path, { backup: args.backup }),
      (deleted) => ({ path: deleted.path, ...(deleted.backupPath ? { backupPath: deleted.backupPath } : {}) }),
    );
  }

  private listDirectory(args: ToolArgs<'list_directory'>, session: Session): Promise<DispatchOutcome> {
    return this.fileEffect(
      session,
      'list_directory',
      `list ${args.path}`,
      () => this.options.files.list(args.path, { recursive: args.recursive, pattern: args.pattern }),
      (listed) => ({
        path: listed.path,
        total: listed.entries.length,
        entries: listed.entries.slice(0, LIST_MAX_ENTRIES).map((e) => (e.type === 'directory' ? `${e.path}/` : e.path)),
        ...(listed.entries.length > LIST_MAX_ENTRIES ? { truncated: true } : {}),
      }),
    );
  }

  private async fileEffect<T>(
    session: Session,
    tool: ToolName,
    description: string,
    effect: () => Promise<T>,
    toPayload: (value: T) => Record<string, unknown>,
  ): Promise<DispatchOutcome> {
    const stepId = await this.startStepIfIdle(session);
    try {
      const value = await effect();
      session.recordAction({ kind: 'file', tool, description, success: true, stepId });
      return { result: { tool, success: true, payload: toPayload(value) } };
    } catch (err) {
      if (!(err instanceof FileOperationError)) throw err;
      session.recordAction({ kind: 'file', tool, description, success: false, detail: err.message, stepId });
      return { result: { tool, success: false, error: err.message } };
    }
  }

  // ── Search ────────────────────────────────────────────────────────────

  private async webSearch(args: ToolArgs<'web_search'>, session: Session, signal?: AbortSignal): Promise<DispatchOutcome> {
    const tool = 'web_search';
    const refusal = await this.confirm(
      session,
      'search',
      { tool, title: 'Search the web', details: [`Query: ${args.query}`], offerAutonomous: true },
      session.mode === 'confirm-each',
      signal,
    );
    if (refusal) return { result: refusal };

    const stepId = await this.startStepIfIdle(session);
    try {
      const found = await this.options.webSearch.search(args.query);
      session.recordAction({
        kind: 'search',
        tool,
        description: args.query,
        success: true,
        detail: `${found.sources.length} source(s), confidence ${found.confidence}`,
        stepId,
      });
      return {
        result: {
          tool,
          success: true,
          payload: {
            query: found.query,
            confidence: found.confidence,
            iterations: found.iterations,
            queries: found.queries,
            summary: found.summary,
            sources: found.sources.slice(0, 5).map((s) => ({
              url: s.url,
              title: s.title,
              relevance: s.relevance,
              content: truncate(s.content, SOURCE_CONTENT_CHARS),
            })),
            followUps: found.followUps,
          },
        },
      };
    } catch (err) {
      const error = `Web search failed: ${errorMessage(err)}`;
      this.logger.warn('Web search failed', { query: args.query, error: errorMessage(err) });
      session.recordAction({ kind: 'search', tool, description: args.query, success: false, detail: error, stepId });
      return { result: { tool, success: false, error } };
    }
  }

  // ── Plan, questions, finish ───────────────────────────────────────────

  private async updatePlanStep(args: ToolArgs<'update_plan_step'>, session: Session): Promise<DispatchOutcome> {
    const tool = 'update_plan_step';
    const plan = session.plan;
    if (!plan) {
      return { result: { tool, success: false, error: 'There is no plan to update' } };
    }

    try {
      let updated = plan;
      const step = plan.steps.find((s) => s.id === args.step);
      // A pending step reported as done passes through in_progress
      if (step && step.status === 'pending' && isTerminal(args.status)) {
        updated = this.planManager.updateStep(updated, step.id, 'in_progress');
      }
      updated = this.planManager.updateStep(updated, args.step, args.status, args.result);
      await session.setPlan(updated);

      const progress = this.planManager.progressSummary(updated);
      session.recordAction({ kind: 'plan', tool, description: `step ${args.step} → ${args.status}`, success: true, detail: args.result, stepId: args.step });
      return {
        result: {
          tool,
          success: true,
          payload: { step: args.step, status: args.status, progress: `${progress.completedCount}/${progress.total} completed (${progress.percentage}%)` },
        },
      };
    } catch (err) {
      if (!(err instanceof UnknownStepError) && !(err instanceof InvalidTransitionError)) throw err;
      session.recordAction({ kind: 'plan', tool, description: `step ${args.step} → ${args.status}`, success: false, detail: err.message, stepId: args.step });
      return { result: { tool, success: false, error: err.message } };
    }
  }

  private async askUser(args: ToolArgs<'ask_user'>, session: Session, signal?: AbortSignal): Promise<DispatchOutcome> {
    const tool = 'ask_user';
    if (session.mode === 'autonomous') {
      return {
        result: {
          tool,
          success: false,
          error: 'ask_user is unavailable in autonomous mode. Proceed with your best judgement and record any assumption in the step result.',
        },
      };
    }

    const answer = await this.options.interaction.ask(args.question, signal);
    session.recordAction({ kind: 'question', tool, description: args.question, success: true, detail: answer });
    return { result: { tool, success: true, payload: { question: args.question, answer } } };
  }

  private async finish(args: ToolArgs<'finish'>, session: Session): Promise<DispatchOutcome> {
    const tool = 'finish';
    const plan = session.plan;
    if (!plan) {
      return { result: { tool, success: false, error: 'Cannot finish: there is no plan' } };
    }

    if (!this.planManager.isComplete(plan)) {
      const unresolved = this.planManager.unresolvedSteps(plan).map((s) => ({ id: s.id, status: s.status }));
      const guard = new IncompletePlanError(unresolved);
      return {
        result: {
          tool,
          success: false,
          error: `${guard.message}. Resolve each step with update_plan_step (completed, failed or skipped) before calling finish.`,
          payload: { unresolved },
        },
      };
    }

    return { result: { tool, success: true, payload: { summary: args.summary } }, finished: true, summary: args.summary };
  }

  // ── Helpers ───────────────────────────────────────────────────────────

  /**
   * Ask for confirmation when `required`. Returns the refusal result, or
   * undefined when the effect may proceed.
   */
  private async confirm(session: Session, kind: ActionKind, request: ConfirmationRequest, required: boolean, signal?: AbortSignal): Promise<ToolResult | undefined> {
    if (!required) return undefined;

    const decision = await this.options.interaction.confirm(request, signal);
    if (!decision.approved) {
      const justification = decision.justification.trim() || 'no reason given';
      session.recordAction({ kind, tool: request.tool, description: request.details[0] ?? request.title, success: false, detail: `declined: ${justification}` });
      return { tool: request.tool, success: false, refused: true, error: `The user declined: ${justification}` };
    }

    if (decision.switchToAutonomous && request.offerAutonomous && session.switchToAutonomous()) {
      this.logger.info('Switched to autonomous mode');
      this.options.events?.emitModeChange(session.mode);
    }
    return undefined;
  }

  /** Mark the first pending step in_progress when no step is active */
  private async startStepIfIdle(session: Session): Promise<number | undefined> {
    const plan = session.plan;
    if (!plan) return undefined;

    const active = this.planManager.activeStep(plan);
    if (active) return active.id;

    const next = this.planManager.nextPendingStep(plan);
    if (!next) return undefined;

    await session.setPlan(this.planManager.updateStep(plan, next.id, 'in_progress'));
    return next.id;
  }
}

// ── Rendering ───────────────────────────────────────────────────────────

function commandPayload(command: string, outcome: CommandResult) {
  const status = outcome.exitCode === null ? 'was terminated by a signal' : `exited with code ${outcome.exitCode}`;
  return {
    command,
    exitCode: outcome.exitCode,
    stdout: tail(outcome.stdout.trim(), OUTPUT_PREVIEW_CHARS),
    stderr: tail(outcome.stderr.trim(), OUTPUT_PREVIEW_CHARS),
    durationMs: outcome.durationMs,
    message: `Command '${command}' ${status}`,
  };
}

function tail(text: string, max: number): string {
  return text.length > max ? `...${text.slice(text.length - max)}` : text;
}

/** Text form of a tool result as appended to the conversation */
export function renderToolResult(result: ToolResult): string {
  return truncate(JSON.stringify(result), RESULT_MESSAGE_CHARS);
}

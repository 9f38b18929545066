import { z } from 'zod';
import { extractJson } from '../agents/json-extractor';
import { InvalidTransitionError, PlanParseError, UnknownStepError } from './errors';

// ── Types ───────────────────────────────────────────────────────────────

export const STEP_STATUSES = ['pending', 'in_progress', 'completed', 'failed', 'skipped'] as const;

export type StepStatus = (typeof STEP_STATUSES)[number];

export interface PlanStep {
  readonly id: number;
  readonly description: string;
  readonly command?: string;
  readonly status: StepStatus;
  readonly result?: string;
  readonly startedAt?: string;
  readonly finishedAt?: string;
}

export interface Plan {
  readonly goal: string;
  readonly steps: readonly PlanStep[];
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface PlanProgress {
  completedCount: number;
  total: number;
  percentage: number;
}

export type StatusCounts = Record<StepStatus, number>;

const TERMINAL: ReadonlySet<StepStatus> = new Set<StepStatus>(['completed', 'failed', 'skipped']);

const ALLOWED_TRANSITIONS: Record<StepStatus, readonly StepStatus[]> = {
  pending: ['in_progress'],
  in_progress: ['completed', 'failed', 'skipped'],
  completed: [],
  failed: [],
  skipped: [],
};

export const STATUS_ICONS: Record<StepStatus, string> = {
  pending: '⬜',
  in_progress: '⏳',
  completed: '✅',
  failed: '❌',
  skipped: '⏭️',
};

const RESULT_PREVIEW_CHARS = 200;

// ── Draft schema ────────────────────────────────────────────────────────

const DraftStepSchema = z.union([
  z
    .string()
    .trim()
    .min(1)
    .transform((description) => ({ description, command: undefined })),
  z.object({
    description: z.string().trim().min(1, 'step description must not be empty'),
    command: z
      .string()
      .nullish()
      .transform((c) => (c && c.trim() ? c.trim() : undefined)),
  }),
]);

const DraftSchema = z.union([z.object({ steps: z.array(DraftStepSchema) }).transform((d) => d.steps), z.array(DraftStepSchema)]);

type DraftStep = z.infer<typeof DraftStepSchema>;

export function isTerminal(status: StepStatus): boolean {
  return TERMINAL.has(status);
}

// ── Plan Manager ────────────────────────────────────────────────────────

/**
 * Owns plan construction and step status rules. Plans are immutable values:
 * every operation returns a new Plan (or the same instance for no-ops).
 */
export class PlanManager {
  constructor(private now: () => Date = () => new Date()) {}

  /**
   * Build a plan from a model draft.
   * @throws PlanParseError when the draft is empty, malformed or has no steps
   */
  createPlan(goal: string, modelDraft: string): Plan {
    const drafted = parseDraft(modelDraft);
    const timestamp = this.now().toISOString();

    return {
      goal,
      steps: drafted.map((d, index) => ({
        id: index + 1,
        description: d.description,
        ...(d.command ? { command: d.command } : {}),
        status: 'pending',
      })),
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  /** Replace the whole step sequence; earlier statuses do not carry over */
  revise(plan: Plan, userFeedback: string, modelDraft: string): Plan {
    if (!userFeedback.trim()) {
      throw new PlanParseError('Revision feedback must not be empty');
    }
    const revised = this.createPlan(plan.goal, modelDraft);
    return { ...revised, createdAt: plan.createdAt };
  }

  /**
   * Apply a status change to one step.
   * Repeating the current status is a no-op and returns the same plan.
   */
  updateStep(plan: Plan, id: number, newStatus: StepStatus, note?: string): Plan {
    const step = plan.steps.find((s) => s.id === id);
    if (!step) {
      throw new UnknownStepError(id, plan.steps.length);
    }

    if (step.status === newStatus) return plan;

    if (!ALLOWED_TRANSITIONS[step.status].includes(newStatus)) {
      throw new InvalidTransitionError(id, step.status, newStatus);
    }

    const timestamp = this.now().toISOString();
    const updated: PlanStep =
      newStatus === 'in_progress'
        ? { ...step, status: newStatus, startedAt: timestamp }
        : { ...step, status: newStatus, finishedAt: timestamp, ...(note ? { result: note } : {}) };

    return {
      ...plan,
      steps: plan.steps.map((s) => (s.id === id ? updated : s)),
      updatedAt: timestamp,
    };
  }

  isComplete(plan: Plan): boolean {
    return plan.steps.length > 0 && plan.steps.every((s) => isTerminal(s.status));
  }

  progressSummary(plan: Plan): PlanProgress {
    const total = plan.steps.length;
    const completedCount = plan.steps.filter((s) => s.status === 'completed').length;
    return {
      completedCount,
      total,
      percentage: total === 0 ? 0 : Math.floor((completedCount / total) * 100),
    };
  }

  statusCounts(plan: Plan): StatusCounts {
    const counts: StatusCounts = { pending: 0, in_progress: 0, completed: 0, failed: 0, skipped: 0 };
    for (const step of plan.steps) counts[step.status]++;
    return counts;
  }

  activeStep(plan: Plan): PlanStep | undefined {
    return plan.steps.find((s) => s.status === 'in_progress');
  }

  nextPendingStep(plan: Plan): PlanStep | undefined {
    return plan.steps.find((s) => s.status === 'pending');
  }

  unresolvedSteps(plan: Plan): PlanStep[] {
    return plan.steps.filter((s) => !isTerminal(s.status));
  }

  /** Text snapshot pinned into the model context */
  renderPlan(plan: Plan): string {
    const lines = [`Current plan for goal: ${plan.goal}`];

    for (const step of plan.steps) {
      lines.push(`${STATUS_ICONS[step.status]} ${step.id}. [${step.status}] ${step.description}`);
      if (step.command) lines.push(`   command: ${step.command}`);
      if (step.result) lines.push(`   result: ${truncate(step.result, RESULT_PREVIEW_CHARS)}`);
    }

    const progress = this.progressSummary(plan);
    const counts = this.statusCounts(plan);
    lines.push(`Progress: ${progress.completedCount}/${progress.total} completed (${progress.percentage}%), ${counts.failed} failed, ${counts.skipped} skipped`);

    return lines.join('\n');
  }
}

// ── Draft parsing ───────────────────────────────────────────────────────

function parseDraft(modelDraft: string): DraftStep[] {
  if (!modelDraft.trim()) {
    throw new PlanParseError('Plan draft is empty');
  }

  const extracted = extractJson(modelDraft);
  if (!extracted.ok) {
    const listed = parseNumberedList(modelDraft);
    if (listed.length > 0) return listed;
    throw new PlanParseError(`Plan draft is not valid JSON (${extracted.attempts.join('; ')})`);
  }

  const parsed = DraftSchema.safeParse(extracted.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new PlanParseError(`Plan draft has the wrong shape${where}: ${issue?.message ?? 'unknown problem'}. Expected {"steps":[{"description":"...","command":"..."}]}`);
  }

  if (parsed.data.length === 0) {
    throw new PlanParseError('Plan draft contains no steps');
  }

  return parsed.data;
}

function parseNumberedList(text: string): DraftStep[] {
  const steps: DraftStep[] = [];
  for (const line of text.split('\n')) {
    const match = /^\s*\d+[.)]\s+(.+)$/.exec(line);
    const description = match?.[1]?.trim();
    if (description) steps.push({ description, command: undefined });
  }
  return steps;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

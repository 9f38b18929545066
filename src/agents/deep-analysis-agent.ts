import { z } from 'zod';
import { extractJson } from './json-extractor';
import type { LanguageModel } from './language-model';
import { buildDeepAnalysisPrompt } from './prompts/deep-analysis';
import { PlanManager, truncate } from '../orchestrator/plan-manager';
import type { SessionView } from '../orchestrator/session';
import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export const VERDICTS = ['completed', 'partially-completed', 'failed'] as const;

export type Verdict = (typeof VERDICTS)[number];

export interface AnalysisReport {
  goalAchievement: string;
  executionSummary: string;
  successes: string[];
  failures: string[];
  technicalAnalysis: string;
  recommendations: string[];
  verdict: Verdict;
  /** `fallback` when the model reply was unusable */
  source: 'model' | 'fallback';
}

export interface SessionAnalyst {
  analyze(session: SessionView): Promise<AnalysisReport>;
}

const ReportSchema = z.object({
  goal_achievement: z.string().min(1),
  execution_summary: z.string().min(1),
  successes: z.array(z.string()).default([]),
  failures: z.array(z.string()).default([]),
  technical_analysis: z.string().default(''),
  recommendations: z.array(z.string()).default([]),
  verdict: z
    .string()
    .transform((v) => v.trim().toLowerCase().replace(/[\s_]+/g, '-'))
    .pipe(z.enum(VERDICTS)),
});

const TRANSCRIPT_MESSAGES = 12;
const TRANSCRIPT_MESSAGE_CHARS = 600;

/**
 * Produces a structured report about a finished session. It only reads the
 * session view; a reply that cannot be parsed yields a report derived from
 * the plan and action log instead.
 */
export class DeepAnalysisAgent implements SessionAnalyst {
  constructor(
    private model: LanguageModel,
    private planManager: PlanManager = new PlanManager(),
    private logger: Logger = silentLogger,
  ) {}

  async analyze(session: SessionView): Promise<AnalysisReport> {
    const prompt = buildDeepAnalysisPrompt({
      goal: session.goal,
      plan: session.plan ? this.planManager.renderPlan(session.plan) : '(no plan)',
      actions: session.actions.map((a) => `- [${a.success ? 'ok' : 'failed'}] ${a.kind}: ${a.description}${a.detail ? ` (${truncate(a.detail, 200)})` : ''}`).join('\n') || '(none)',
      summary: session.summary ?? '(none)',
      transcript: session.transcript
        .filter((m) => m.role !== 'system')
        .slice(-TRANSCRIPT_MESSAGES)
        .map((m) => `${m.role}: ${truncate(m.content, TRANSCRIPT_MESSAGE_CHARS)}`)
        .join('\n'),
    });

    let raw: string;
    try {
      raw = await this.model.send([{ role: 'user', content: prompt }]);
    } catch (err) {
      this.logger.warn('Deep analysis request failed, using fallback report', { error: errorMessage(err) });
      return fallbackReport(session, this.planManager);
    }

    const extracted = extractJson(raw);
    const parsed = extracted.ok ? ReportSchema.safeParse(extracted.value) : undefined;
    if (!parsed?.success) {
      this.logger.warn('Deep analysis reply was unusable, using fallback report');
      return fallbackReport(session, this.planManager);
    }

    const report = parsed.data;
    return {
      goalAchievement: report.goal_achievement,
      executionSummary: report.execution_summary,
      successes: report.successes,
      failures: report.failures,
      technicalAnalysis: report.technical_analysis,
      recommendations: report.recommendations,
      verdict: report.verdict,
      source: 'model',
    };
  }
}

/** Verdict from plan statuses: all completed, some completed, or none */
export function fallbackVerdict(session: SessionView): Verdict {
  const steps = session.plan?.steps ?? [];
  if (steps.length > 0) {
    const completed = steps.filter((s) => s.status === 'completed').length;
    if (completed === steps.length) return 'completed';
    return completed > 0 ? 'partially-completed' : 'failed';
  }

  const succeeded = session.actions.filter((a) => a.success).length;
  if (session.actions.length > 0 && succeeded === session.actions.length) return 'completed';
  return succeeded > 0 ? 'partially-completed' : 'failed';
}

export function fallbackReport(session: SessionView, planManager: PlanManager = new PlanManager()): AnalysisReport {
  const steps = session.plan?.steps ?? [];
  const verdict = fallbackVerdict(session);
  const progress = session.plan ? planManager.progressSummary(session.plan) : undefined;
  const succeeded = session.actions.filter((a) => a.success);
  const failed = session.actions.filter((a) => !a.success);

  return {
    goalAchievement: progress ? `${progress.completedCount} of ${progress.total} plan step(s) completed (${progress.percentage}%)` : 'No plan was recorded',
    executionSummary: `${session.actions.length} action(s) attempted over ${session.stepCount} step(s), ${succeeded.length} succeeded`,
    successes: steps.filter((s) => s.status === 'completed').map((s) => `Step ${s.id}: ${s.description}`),
    failures: [
      ...steps.filter((s) => s.status === 'failed').map((s) => `Step ${s.id}: ${s.description}${s.result ? ` (${s.result})` : ''}`),
      ...failed.map((a) => `${a.kind}: ${a.description}${a.detail ? ` (${truncate(a.detail, 200)})` : ''}`),
    ],
    technicalAnalysis: session.summary ?? '',
    recommendations: verdict === 'completed' ? [] : ['Review the failed steps and run the remaining work as a new goal'],
    verdict,
    source: 'fallback',
  };
}

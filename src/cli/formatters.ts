import chalk from 'chalk';
import type { SessionState } from '../orchestrator/states';
import type { SessionReport } from '../orchestrator/orchestrator';
import type { ToolResult } from '../orchestrator/tool-dispatcher';
import type { ConfirmationRequest } from '../orchestrator/interaction';
import type { RiskTier } from '../orchestrator/security-gate';
import type { ToolInvocation } from '../agents/tool-schemas';
import type { AnalysisReport } from '../agents/deep-analysis-agent';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

// ── State progress ──────────────────────────────────────────────────────

const STATE_LABELS: Record<SessionState, string> = {
  PLAN_PENDING: 'Drafting plan...',
  PLAN_REVIEW: 'Reviewing plan...',
  EXECUTING: 'Executing plan...',
  FINISHED: 'Finished',
  ABORTED: 'Aborted',
};

export function formatStateTransition(from: SessionState, to: SessionState): string {
  return chalk.cyan(`  [${from} -> ${to}] ${STATE_LABELS[to]}`);
}

// ── Verbose interim output ──────────────────────────────────────────────

export function formatVerboseSection(title: string, body: string): string {
  const separator = chalk.gray('─'.repeat(60));
  return `${separator}\n${chalk.bold(title)}\n${body}\n${separator}`;
}

// ── Tool calls ──────────────────────────────────────────────────────────

const RISK_COLOURS: Record<RiskTier, (text: string) => string> = {
  safe: chalk.green,
  caution: chalk.yellow,
  dangerous: chalk.red.bold,
  blocked: chalk.red,
};

/** One-line description of a tool call as the model issued it */
export function describeInvocation(invocation: ToolInvocation): string {
  switch (invocation.tool) {
    case 'execute_command':
      return `run: ${invocation.args.command}`;
    case 'read_file':
      return `read ${invocation.args.path}`;
    case 'write_file':
      return `write ${invocation.args.path}`;
    case 'edit_file':
      return `${invocation.args.action} in ${invocation.args.path}`;
    case 'copy_file':
      return `copy ${invocation.args.source} -> ${invocation.args.destination}`;
    case 'delete_file':
      return `delete ${invocation.args.path}`;
    case 'list_directory':
      return `list ${invocation.args.path}`;
    case 'web_search':
      return `search: ${invocation.args.query}`;
    case 'update_plan_step':
      return `step ${invocation.args.step} -> ${invocation.args.status}`;
    case 'ask_user':
      return `question: ${invocation.args.question}`;
    case 'finish':
      return 'finish';
  }
}

export function formatInvocation(invocation: ToolInvocation, step: number): string {
  return formatStep(`[${step}] ${describeInvocation(invocation)}`);
}

export function formatToolResult(result: ToolResult, verbose = false): string {
  if (result.success) {
    const message = typeof result.payload?.message === 'string' ? result.payload.message : `${result.tool} succeeded`;
    const lines = [formatSuccess(message)];
    if (verbose && result.payload) lines.push(formatInfo(JSON.stringify(result.payload, null, 2)));
    return lines.join('\n');
  }

  const label = result.blocked ? 'blocked' : result.refused ? 'declined' : result.timedOut ? 'timed out' : result.interrupted ? 'interrupted' : 'failed';
  const lines = [formatWarning(`${result.tool} ${label}: ${result.error ?? 'no details'}`)];
  const stderr = result.payload?.stderr;
  if (verbose && typeof stderr === 'string' && stderr) lines.push(formatInfo(stderr));
  return lines.join('\n');
}

export function formatConfirmation(request: ConfirmationRequest): string {
  const [first, ...rest] = request.details;
  const lines = [chalk.bold(`${request.title}:`), `  ${chalk.white(first ?? '')}`, ...rest.map((line) => formatInfo(line))];
  if (request.verdict) {
    const colour = RISK_COLOURS[request.verdict.tier];
    lines.push(`  ${colour(`risk: ${request.verdict.tier}`)}`);
  }
  return lines.join('\n');
}

// ── Final result ────────────────────────────────────────────────────────

export function formatSessionReport(report: SessionReport, opts?: { verbose?: boolean }): string {
  const lines: string[] = [''];

  if (report.status === 'finished') {
    lines.push(chalk.green.bold('Goal finished.'));
  } else {
    lines.push(chalk.red.bold('Session aborted.'));
  }

  lines.push(formatInfo(`Run ID:    ${report.runId}`));
  lines.push(formatInfo(`Goal:      ${report.goal}`));
  lines.push(formatInfo(`State:     ${report.finalState}`));
  lines.push(formatInfo(`Mode:      ${report.mode}`));
  lines.push(formatInfo(`Steps:     ${report.stepsUsed}/${report.stepLimit}`));
  if (report.progress) {
    lines.push(formatInfo(`Plan:      ${report.progress.completedCount}/${report.progress.total} completed (${report.progress.percentage}%)`));
  }
  lines.push(formatInfo(`Actions:   ${report.actionsSucceeded}/${report.actionsAttempted} succeeded`));
  lines.push(formatInfo(`Duration:  ${(report.durationMs / 1000).toFixed(1)}s`));

  if (report.summary) {
    lines.push(formatSuccess(`Summary: ${report.summary}`));
  }

  if (report.abort) {
    const where = report.abort.activeStep ? `${report.abort.stoppedAt}, step ${report.abort.activeStep}` : report.abort.stoppedAt;
    lines.push(formatError(`Error: [${report.abort.code}] ${report.abort.message}`));
    lines.push(formatInfo(`Stopped at: ${where}`));
    if (report.abort.details && opts?.verbose) {
      lines.push(formatInfo(`Details: ${report.abort.details}`));
    }
  }

  return lines.join('\n');
}

export function formatAnalysis(report: AnalysisReport): string {
  const list = (items: string[]): string => (items.length ? items.map((i) => `    - ${i}`).join('\n') : '    (none)');
  const verdictColour = report.verdict === 'completed' ? chalk.green : report.verdict === 'failed' ? chalk.red : chalk.yellow;
  const body = [
    `  verdict:        ${verdictColour(report.verdict)}`,
    `  achievement:    ${report.goalAchievement}`,
    `  execution:      ${report.executionSummary}`,
    '  successes:',
    list(report.successes),
    '  failures:',
    list(report.failures),
    ...(report.technicalAnalysis ? [`  technical:      ${report.technicalAnalysis}`] : []),
    '  recommendations:',
    list(report.recommendations),
  ];
  return formatVerboseSection(report.source === 'model' ? 'Deep Analysis' : 'Deep Analysis (from plan status)', body.join('\n'));
}

import { Command } from 'commander';
import { HistoryStore } from '../history-store';
import { formatError, formatInfo, formatSuccess } from '../formatters';
import { PlanManager } from '../../orchestrator/plan-manager';
import type { PersistedSession } from '../../orchestrator/states';

type StatusCommandOptions = {
  runId?: string;
  root?: string;
  json?: boolean;
};

async function resolveSession(store: HistoryStore, runId?: string): Promise<PersistedSession | null> {
  if (runId) {
    return store.load(runId);
  }

  const latest = await store.latest();
  if (!latest?.runId) return null;
  return store.load(latest.runId);
}

export function renderSession(session: PersistedSession): string[] {
  const lines = [
    formatSuccess('Session status'),
    formatInfo(`runId: ${session.runId}`),
    formatInfo(`goal: ${session.goal}`),
    formatInfo(`state: ${session.currentState}`),
    formatInfo(`mode: ${session.mode}`),
    formatInfo(`target: ${session.target}`),
    formatInfo(`steps: ${session.stepCount}/${session.stepLimit}`),
    formatInfo(`updatedAt: ${session.updatedAt}`),
  ];

  if (session.plan) {
    lines.push(...new PlanManager().renderPlan(session.plan).split('\n').map((line) => formatInfo(line)));
  }

  if (session.summary) {
    lines.push(formatSuccess(`summary: ${session.summary}`));
  }

  if (session.error) {
    lines.push(formatError(`error: ${session.error.code} - ${session.error.message}`));
    if (session.error.details) lines.push(formatInfo(`details: ${session.error.details}`));
  }

  return lines;
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the state of the latest (or a given) session')
    .option('--run-id <id>', 'Show status for a specific run id')
    .option('--root <dir>', 'Session storage directory', '.taskpilot')
    .option('--json', 'Output status as JSON', false)
    .action(async (options: StatusCommandOptions) => {
      try {
        const store = new HistoryStore({ rootDir: options.root });

        const session = await resolveSession(store, options.runId);

        if (!session) {
          const msg = options.runId ? `No session found for runId: ${options.runId}` : 'No session found.';
          console.log(formatInfo(msg));
          return;
        }

        if (options.json) {
          console.log(JSON.stringify(session, null, 2));
          return;
        }

        renderSession(session).forEach((line) => console.log(line));
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(formatError(msg));
        process.exitCode = 1;
      }
    });
}

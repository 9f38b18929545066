import { Command } from 'commander';
import path from 'node:path';
import { HistoryStore } from '../history-store';
import type { HistoryEntrySummary } from '../history-store';
import { formatError, formatInfo, formatSuccess } from '../formatters';
import { renderSession } from './status';
import type { SessionState } from '../../orchestrator/states';

type HistoryCommandOptions = {
  runId?: string;
  root?: string;
  goal?: string;
  state?: string;
  from?: string;
  to?: string;
  limit?: string;
  export?: string;
  json?: boolean;
};

const STATES: readonly SessionState[] = ['PLAN_PENDING', 'PLAN_REVIEW', 'EXECUTING', 'FINISHED', 'ABORTED'];

function parseDate(input: string | undefined): Date | undefined {
  if (!input) return undefined;
  const d = new Date(input);
  return Number.isFinite(d.getTime()) ? d : undefined;
}

function parseLimit(input: string | undefined): number | undefined {
  if (!input) return undefined;
  const n = Number.parseInt(input, 10);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

function parseState(input: string | undefined): SessionState | undefined {
  if (!input) return undefined;
  const upper = input.trim().toUpperCase();
  return STATES.find((s) => s === upper);
}

export function formatHistoryLine(e: HistoryEntrySummary): string {
  const progress = e.progress ? ` ${e.progress.completed}/${e.progress.total}` : '';
  return `${e.updatedAt} ${e.runId} ${e.currentState}${progress} ${e.goal}`.trim();
}

async function showDetail(store: HistoryStore, runId: string, json: boolean | undefined): Promise<void> {
  const detail = await store.detail(runId);
  if (!detail) {
    console.log(formatInfo(`No history found for runId: ${runId}`));
    return;
  }

  if (json) {
    console.log(JSON.stringify(detail, null, 2));
    return;
  }

  renderSession(detail.session).forEach((line) => console.log(line));
  if (detail.session.goals.length > 1) {
    console.log(formatInfo(`goals: ${detail.session.goals.join(' | ')}`));
  }
}

async function showList(store: HistoryStore, options: HistoryCommandOptions): Promise<void> {
  const entries = await store.list({
    goal: options.goal,
    state: parseState(options.state),
    from: parseDate(options.from),
    to: parseDate(options.to),
    limit: parseLimit(options.limit),
  });

  if (options.export) {
    const exportPath = path.resolve(process.cwd(), options.export);
    await store.exportToFile(entries, exportPath);
  }

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }

  if (!entries.length) {
    console.log(formatInfo('No history entries found.'));
    return;
  }

  console.log(formatSuccess('Session history'));
  for (const e of entries) {
    console.log(formatInfo(formatHistoryLine(e)));
  }

  if (options.export) {
    console.log(formatInfo(`exported: ${options.export}`));
  }
}

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List past sessions')
    .option('--run-id <id>', 'Show detailed view for a specific run id')
    .option('--root <dir>', 'Session storage directory', '.taskpilot')
    .option('--goal <text>', 'Filter by goal text')
    .option('--state <state>', 'Filter by session state')
    .option('--from <date>', 'Filter by updatedAt >= date (ISO string)')
    .option('--to <date>', 'Filter by updatedAt <= date (ISO string)')
    .option('--limit <n>', 'Limit number of results')
    .option('--export <file>', 'Export results to JSON file')
    .option('--json', 'Output as JSON', false)
    .action(async (options: HistoryCommandOptions) => {
      try {
        const store = new HistoryStore({ rootDir: options.root });

        if (options.runId) {
          await showDetail(store, options.runId, options.json);
          return;
        }

        await showList(store, options);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(formatError(msg));
        process.exitCode = 1;
      }
    });
}

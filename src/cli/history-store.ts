import fs from 'node:fs/promises';
import path from 'node:path';
import { SessionStore, sessionPath } from '../orchestrator/state-store';
import type { PersistedSession, SessionState } from '../orchestrator/states';

export type HistoryStoreOptions = {
  rootDir?: string;
};

export type HistoryFilter = {
  /** Case-insensitive substring of any goal of the session */
  goal?: string;
  state?: SessionState;
  from?: Date;
  to?: Date;
  limit?: number;
};

export type HistoryEntrySummary = {
  runId: string;
  currentState: SessionState;
  updatedAt: string;
  goal: string;
  mode: PersistedSession['mode'];
  target: string;
  stepCount: number;
  stepLimit: number;
  progress?: { completed: number; total: number };
  error?: PersistedSession['error'];
};

export type HistoryEntryDetail = {
  session: PersistedSession;
};

/** Read side of the persisted session records under `<root>/<runId>/session.json` */
export class HistoryStore {
  private rootDir: string;

  constructor(opts?: HistoryStoreOptions) {
    this.rootDir = opts?.rootDir ?? '.taskpilot';
  }

  async load(runId: string): Promise<PersistedSession | null> {
    return new SessionStore(sessionPath(this.rootDir, runId)).load();
  }

  async listRunIds(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.rootDir, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch {
      return [];
    }
  }

  private toSummary(session: PersistedSession): HistoryEntrySummary {
    const steps = session.plan?.steps ?? [];
    return {
      runId: session.runId,
      currentState: session.currentState,
      updatedAt: session.updatedAt,
      goal: session.goal,
      mode: session.mode,
      target: session.target,
      stepCount: session.stepCount,
      stepLimit: session.stepLimit,
      ...(session.plan ? { progress: { completed: steps.filter((s) => s.status === 'completed').length, total: steps.length } } : {}),
      ...(session.error ? { error: session.error } : {}),
    };
  }

  private matchesFilter(session: PersistedSession, filter: HistoryFilter): boolean {
    if (filter.state && session.currentState !== filter.state) return false;

    if (filter.goal) {
      const needle = filter.goal.trim().toLowerCase();
      if (!session.goals.some((g) => g.toLowerCase().includes(needle))) return false;
    }

    const updatedAtMs = Date.parse(session.updatedAt);
    if (Number.isFinite(updatedAtMs)) {
      if (filter.from && updatedAtMs < filter.from.getTime()) return false;
      if (filter.to && updatedAtMs > filter.to.getTime()) return false;
    }

    return true;
  }

  async list(filter: HistoryFilter = {}): Promise<HistoryEntrySummary[]> {
    const runIds = await this.listRunIds();

    const sessions = await Promise.all(runIds.map((id) => this.load(id)));

    const summaries = sessions
      .filter((s): s is PersistedSession => Boolean(s))
      .filter((s) => this.matchesFilter(s, filter))
      .map((s) => this.toSummary(s))
      .sort((a, b) => Date.parse(b.updatedAt) - Date.parse(a.updatedAt));

    if (filter.limit && filter.limit > 0) {
      return summaries.slice(0, filter.limit);
    }

    return summaries;
  }

  async latest(): Promise<HistoryEntrySummary | null> {
    const list = await this.list({ limit: 1 });
    return list[0] ?? null;
  }

  async detail(runId: string): Promise<HistoryEntryDetail | null> {
    const session = await this.load(runId);
    if (!session) return null;
    return { session };
  }

  async exportToFile(entries: HistoryEntrySummary[], filePath: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(entries, null, 2), 'utf8');
  }
}

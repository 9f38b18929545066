import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { PersistedSession } from './states';

export const SESSION_FILE = 'session.json';

const StepSchema = z.object({
  id: z.number(),
  description: z.string(),
  command: z.string().optional(),
  status: z.enum(['pending', 'in_progress', 'completed', 'failed', 'skipped']),
  result: z.string().optional(),
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
});

const StateSchema = z.enum(['PLAN_PENDING', 'PLAN_REVIEW', 'EXECUTING', 'FINISHED', 'ABORTED']);

export const PersistedSessionSchema = z.object({
  runId: z.string(),
  currentState: StateSchema,
  updatedAt: z.string(),
  goal: z.string(),
  goals: z.array(z.string()),
  mode: z.enum(['confirm-each', 'autonomous']),
  target: z.string(),
  stepCount: z.number(),
  stepLimit: z.number(),
  plan: z
    .object({ goal: z.string(), steps: z.array(StepSchema), createdAt: z.string(), updatedAt: z.string() })
    .nullable(),
  history: z.array(StateSchema),
  summary: z.string().optional(),
  error: z.object({ code: z.string(), message: z.string(), details: z.string().optional() }).optional(),
}) satisfies z.ZodType<PersistedSession>;

/** Where a session record lives: `<root>/<runId>/session.json` */
export function sessionPath(root: string, runId: string): string {
  return path.join(root, runId, SESSION_FILE);
}

export class SessionStore {
  constructor(private storagePath: string) {}

  static forRun(root: string, runId: string): SessionStore {
    return new SessionStore(sessionPath(root, runId));
  }

  getPath(): string {
    return this.storagePath;
  }

  async save(session: PersistedSession): Promise<void> {
    const dir = path.dirname(this.storagePath);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(this.storagePath, JSON.stringify(session, null, 2), 'utf-8');
  }

  /** Returns null when the file is missing or is not a session record */
  async load(): Promise<PersistedSession | null> {
    let data: string;
    try {
      data = await fs.readFile(this.storagePath, 'utf-8');
    } catch {
      return null;
    }
    try {
      const parsed = PersistedSessionSchema.safeParse(JSON.parse(data));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.storagePath);
      return true;
    } catch {
      return false;
    }
  }
}

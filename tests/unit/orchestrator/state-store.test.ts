import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { SessionStore, sessionPath } from '../../../src/orchestrator/state-store';
import type { PersistedSession } from '../../../src/orchestrator/states';

const RECORD: PersistedSession = {
  runId: 'run-42',
  currentState: 'EXECUTING',
  updatedAt: '2026-03-01T10:00:00.000Z',
  goal: 'Rotate logs',
  goals: ['Rotate logs'],
  mode: 'autonomous',
  target: 'local',
  stepCount: 2,
  stepLimit: 50,
  plan: {
    goal: 'Rotate logs',
    steps: [{ id: 1, description: 'Run logrotate', command: 'logrotate -f /etc/logrotate.conf', status: 'in_progress' }],
    createdAt: '2026-03-01T09:59:00.000Z',
    updatedAt: '2026-03-01T10:00:00.000Z',
  },
  history: ['PLAN_PENDING', 'PLAN_REVIEW'],
};

describe('SessionStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'session-store-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('places each run under its own directory', () => {
    expect(sessionPath('/data', 'abc')).toBe(path.join('/data', 'abc', 'session.json'));
    expect(SessionStore.forRun('/data', 'abc').getPath()).toBe(path.join('/data', 'abc', 'session.json'));
  });

  it('saves and loads a record', async () => {
    const store = SessionStore.forRun(root, 'run-42');
    expect(await store.exists()).toBe(false);

    await store.save(RECORD);

    expect(await store.exists()).toBe(true);
    expect(await store.load()).toEqual(RECORD);
  });

  it('returns null for a missing file', async () => {
    expect(await SessionStore.forRun(root, 'nope').load()).toBeNull();
  });

  it('returns null for a file that is not a session record', async () => {
    const file = sessionPath(root, 'bad');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '{"runId": 1}');
    expect(await new SessionStore(file).load()).toBeNull();

    await fs.writeFile(file, 'not json');
    expect(await new SessionStore(file).load()).toBeNull();
  });
});

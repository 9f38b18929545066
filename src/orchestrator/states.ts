import type { ExecutionMode } from '../config/validator';
import type { Plan } from './plan-manager';

export type ActiveState = 'PLAN_PENDING' | 'PLAN_REVIEW' | 'EXECUTING';

export type TerminalState = 'FINISHED' | 'ABORTED';

export type SessionState = ActiveState | TerminalState;

export const TERMINAL_STATES: readonly SessionState[] = ['FINISHED', 'ABORTED'];

export interface SessionError {
  code: string;
  message: string;
  details?: string;
}

/** Durable record written after every transition and plan change */
export interface PersistedSession {
  runId: string;
  currentState: SessionState;
  updatedAt: string;
  goal: string;
  goals: string[];
  mode: ExecutionMode;
  target: string;
  stepCount: number;
  stepLimit: number;
  plan: Plan | null;
  history: SessionState[];
  summary?: string;
  error?: SessionError;
}

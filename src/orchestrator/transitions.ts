import type { SessionState } from './states';

export type Trigger = 'PLAN_READY' | 'PLAN_ACCEPTED' | 'REVISION_REQUESTED' | 'FINISH' | 'ABORT' | 'CONTINUE';

export const transitions: Record<SessionState, Partial<Record<Trigger, SessionState>>> = {
  PLAN_PENDING: { PLAN_READY: 'PLAN_REVIEW' },
  PLAN_REVIEW: { PLAN_ACCEPTED: 'EXECUTING', REVISION_REQUESTED: 'PLAN_PENDING' },
  EXECUTING: { FINISH: 'FINISHED' },
  FINISHED: { CONTINUE: 'PLAN_PENDING' },
  ABORTED: {},
};

import { isTerminal } from './plan-manager';
import type { Plan } from './plan-manager';
import type { SessionState } from './states';

export interface GuardContext {
  plan?: Plan;
}

export type GuardFn = (context: GuardContext) => boolean | Promise<boolean>;

export const transitionGuards: Partial<Record<SessionState, GuardFn>> = {
  // Execution needs an accepted, non-empty plan
  EXECUTING: (ctx) => Boolean(ctx.plan && ctx.plan.steps.length > 0),
  // Finish Guard: every step resolved
  FINISHED: (ctx) => Boolean(ctx.plan && ctx.plan.steps.length > 0 && ctx.plan.steps.every((s) => isTerminal(s.status))),
};

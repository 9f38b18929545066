import type { SecurityVerdict } from './security-gate';
import type { Plan } from './plan-manager';
import type { ToolName } from '../agents/tool-schemas';

export interface ConfirmationRequest {
  tool: ToolName;
  /** Short imperative, e.g. "Run command" or "Write file" */
  title: string;
  /** Lines describing exactly what will happen */
  details: string[];
  verdict?: SecurityVerdict;
  /** False when the request must be answered individually even in autonomous mode */
  offerAutonomous: boolean;
}

export type ConfirmationDecision = { approved: true; switchToAutonomous?: boolean } | { approved: false; justification: string };

export type PlanReviewDecision = { action: 'accept'; switchToAutonomous?: boolean } | { action: 'revise'; feedback: string };

/**
 * Everything the orchestrator needs from the person at the keyboard.
 * Implementations reject with InteractionInterruptedError when the signal fires.
 */
export interface UserInteraction {
  confirm(request: ConfirmationRequest, signal?: AbortSignal): Promise<ConfirmationDecision>;
  ask(question: string, signal?: AbortSignal): Promise<string>;
  reviewPlan(plan: Plan, rendered: string, signal?: AbortSignal): Promise<PlanReviewDecision>;
}

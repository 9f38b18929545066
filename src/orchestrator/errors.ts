import { TaskPilotError } from '../utils/errors';
import type { StepStatus } from './plan-manager';

export class PlanParseError extends TaskPilotError {
  constructor(message: string) {
    super(message, 'PLAN_PARSE_ERROR');
    this.name = 'PlanParseError';
  }
}

export class UnknownStepError extends TaskPilotError {
  constructor(
    public stepId: number,
    public total: number,
  ) {
    super(`Unknown plan step ${stepId}: the plan has steps 1..${total}`, 'UNKNOWN_STEP');
    this.name = 'UnknownStepError';
  }
}

export class InvalidTransitionError extends TaskPilotError {
  constructor(
    public stepId: number,
    public from: StepStatus,
    public to: StepStatus,
  ) {
    super(`Step ${stepId} cannot move from "${from}" to "${to}"`, 'INVALID_STEP_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

export class IncompletePlanError extends TaskPilotError {
  constructor(public unresolved: Array<{ id: number; status: StepStatus }>) {
    const list = unresolved.map((s) => `${s.id} (${s.status})`).join(', ');
    super(`Cannot finish: plan steps ${list} are unresolved`, 'INCOMPLETE_PLAN');
    this.name = 'IncompletePlanError';
  }
}

export class UnrecoverableResponseError extends TaskPilotError {
  constructor(
    public attempts: number,
    public defects: string[],
  ) {
    super(`Model failed to produce a valid response after ${attempts} attempt(s): ${defects[defects.length - 1] ?? 'unknown defect'}`, 'UNRECOVERABLE_RESPONSE');
    this.name = 'UnrecoverableResponseError';
  }
}

export class InteractionInterruptedError extends TaskPilotError {
  constructor(message = 'Interrupted by user') {
    super(message, 'INTERRUPTED');
    this.name = 'InteractionInterruptedError';
  }
}

export class StepLimitExceededError extends TaskPilotError {
  constructor(public limit: number) {
    super(`Step limit exceeded: the goal was not finished within ${limit} step(s)`, 'STEP_LIMIT_EXCEEDED');
    this.name = 'StepLimitExceededError';
  }
}

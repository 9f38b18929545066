import { EventEmitter } from 'events';
import type { Trigger } from './transitions';
import type { SessionState } from './states';
import type { ExecutionMode } from '../config/validator';
import type { Plan } from './plan-manager';
import type { ToolInvocation } from '../agents/tool-schemas';
import type { ToolResult } from './tool-dispatcher';

export interface StateChangeEvent {
  from: SessionState;
  to: SessionState;
  trigger: Trigger;
  runId: string;
  timestamp: string;
}

export class StateMachineEvents extends EventEmitter {
  emitTransition(event: StateChangeEvent): void {
    this.emit('stateChange', event);
  }
}

export interface SessionEventMap {
  plan: [plan: Plan];
  invocation: [invocation: ToolInvocation, step: number];
  result: [result: ToolResult];
  modeChange: [mode: ExecutionMode];
}

/** Progress notifications for whoever renders the session (the CLI) */
export class SessionEvents extends EventEmitter<SessionEventMap> {
  emitPlan(plan: Plan): void {
    this.emit('plan', plan);
  }

  emitInvocation(invocation: ToolInvocation, step: number): void {
    this.emit('invocation', invocation, step);
  }

  emitResult(result: ToolResult): void {
    this.emit('result', result);
  }

  emitModeChange(mode: ExecutionMode): void {
    this.emit('modeChange', mode);
  }
}

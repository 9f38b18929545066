import { UnrecoverableResponseError, StepLimitExceededError, InteractionInterruptedError } from './errors';
import { BackendFatalError } from '../execution/errors';
import { LanguageModelError } from '../agents/clients/errors';
import { TaskPilotError, errorMessage } from '../utils/errors';

export type AbortCode = 'UNRECOVERABLE_RESPONSE' | 'STEP_LIMIT_EXCEEDED' | 'BACKEND_FATAL' | 'MODEL_UNAVAILABLE' | 'INTERRUPTED' | 'UNEXPECTED_ERROR';

/** Structured classification of an error that escaped the execution loop */
export interface AbortReason {
  code: AbortCode;
  message: string;
  details?: string;
}

/**
 * Maps errors escaping the orchestrator loop to abort codes. Everything that
 * reaches this point ends the session; component-local failures never do.
 */
export class RecoveryManager {
  classify(error: unknown): AbortReason {
    const message = errorMessage(error);
    const details = error instanceof Error ? error.stack : undefined;

    if (error instanceof UnrecoverableResponseError) {
      return { code: 'UNRECOVERABLE_RESPONSE', message, details: error.defects.join('\n') };
    }
    if (error instanceof StepLimitExceededError) {
      return { code: 'STEP_LIMIT_EXCEEDED', message };
    }
    if (error instanceof BackendFatalError) {
      return { code: 'BACKEND_FATAL', message, details };
    }
    if (error instanceof LanguageModelError) {
      return { code: 'MODEL_UNAVAILABLE', message, details: error.status ? `HTTP ${error.status}` : undefined };
    }
    if (error instanceof InteractionInterruptedError) {
      return { code: 'INTERRUPTED', message };
    }
    if (error instanceof TaskPilotError) {
      return { code: 'UNEXPECTED_ERROR', message: `${error.code}: ${message}`, details };
    }
    return { code: 'UNEXPECTED_ERROR', message, details };
  }
}

import { TaskPilotError } from '../utils/errors';

/** The backend can no longer execute anything (lost SSH connection, missing shell) */
export class BackendFatalError extends TaskPilotError {
  constructor(message: string, originalError?: unknown) {
    super(message, 'BACKEND_FATAL', originalError);
    this.name = 'BackendFatalError';
  }
}

export class InvalidRemoteTargetError extends TaskPilotError {
  constructor(value: string) {
    super(`Invalid remote target "${value}". Expected user@host or user@host:port`, 'INVALID_REMOTE_TARGET');
    this.name = 'InvalidRemoteTargetError';
  }
}

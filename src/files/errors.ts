import { TaskPilotError } from '../utils/errors';

export class FileOperationError extends TaskPilotError {
  constructor(
    message: string,
    public path: string,
    originalError?: unknown,
  ) {
    super(message, 'FILE_OPERATION_FAILED', originalError);
    this.name = 'FileOperationError';
  }
}

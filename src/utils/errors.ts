/**
 * Base class for every error the agent raises on purpose.
 * `code` is a stable identifier used in persisted session records and reports.
 */
export class TaskPilotError extends Error {
  constructor(
    public message: string,
    public code: string,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'TaskPilotError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

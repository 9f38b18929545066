import { parseRemoteTarget } from '../execution/remote-target';
import type { RemoteTarget } from '../execution/remote-target';
import { InvalidRemoteTargetError } from '../execution/errors';
import { ENGINES } from '../config/validator';
import type { Engine } from '../config/validator';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

const MAX_STEP_LIMIT = 10_000;

/** `--step-limit`: a positive integer */
export function parseStepLimit(input: string): number {
  const value = Number(input.trim());
  if (!Number.isInteger(value) || value < 1 || value > MAX_STEP_LIMIT) {
    throw new ValidationError(`Invalid step limit: "${input}". Expected an integer between 1 and ${MAX_STEP_LIMIT}`);
  }
  return value;
}

/** `--timeout` / `--remote-timeout`: seconds, returned as milliseconds */
export function parseTimeoutSeconds(input: string, flag = '--timeout'): number {
  const value = Number(input.trim());
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`Invalid ${flag} value: "${input}". Expected a positive number of seconds`);
  }
  return Math.round(value * 1000);
}

/** `--remote user@host[:port]` */
export function parseRemote(input: string): RemoteTarget {
  try {
    return parseRemoteTarget(input);
  } catch (err) {
    if (err instanceof InvalidRemoteTargetError) throw new ValidationError(err.message);
    throw err;
  }
}

/** `--engine`; `google` is accepted for gemini */
export function parseEngine(input: string): Engine {
  const normalized = input.trim().toLowerCase();
  const name = normalized === 'google' ? 'gemini' : normalized;
  const match = ENGINES.find((e) => e === name);
  if (!match) {
    throw new ValidationError(`Invalid engine: "${input}". Expected one of ${ENGINES.join(', ')}`);
  }
  return match;
}

/** Goal words joined by spaces; empty when none were given */
export function joinGoal(words: string[] | undefined): string {
  return (words ?? []).join(' ').trim();
}

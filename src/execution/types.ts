import type { RemoteTarget } from './remote-target';

export interface CommandResult {
  /** Null when the process was terminated by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  interrupted: boolean;
  durationMs: number;
}

/** Long-lived authenticated connection to a remote host */
export interface RemoteSession {
  readonly target: RemoteTarget;
  /** Arguments placed before the remote command on every ssh invocation */
  sshArgs(): string[];
  isOpen(): boolean;
}

export type ExecutionTarget = { kind: 'local'; cwd?: string } | { kind: 'remote'; session: RemoteSession };

export interface RunOptions {
  timeoutMs: number;
  target: ExecutionTarget;
  signal?: AbortSignal;
  /** Written to the process stdin, which is then closed */
  input?: string;
}

export interface ExecutionBackend {
  run(command: string, options: RunOptions): Promise<CommandResult>;
}

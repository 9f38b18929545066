import { spawn, ChildProcess } from 'child_process';
import { BackendFatalError } from './errors';
import { formatRemoteTarget } from './remote-target';
import type { CommandResult, ExecutionBackend, RunOptions } from './types';

/** ssh reserves exit status 255 for its own failures (connection, auth) */
export const SSH_CONNECTION_FAILURE = 255;

const MAX_OUTPUT_CHARS = 1_000_000;
const KILL_GRACE_MS = 2_000;

export interface ProcessBackendOptions {
  /** Shell used for local commands (default: /bin/sh) */
  shell?: string;
  /** ssh client for remote commands (default: ssh on PATH) */
  ssh?: string;
}

/**
 * Runs commands as child processes: locally through a shell, remotely through
 * `ssh` multiplexed over the session's control connection. Every command runs
 * in its own process group so timeouts and interrupts can stop the whole tree;
 * `run` settles only after the process has exited.
 */
export class ProcessExecutionBackend implements ExecutionBackend {
  private shell: string;
  private ssh: string;

  constructor(options: ProcessBackendOptions = {}) {
    this.shell = options.shell ?? '/bin/sh';
    this.ssh = options.ssh ?? 'ssh';
  }

  run(command: string, options: RunOptions): Promise<CommandResult> {
    const { target } = options;

    if (target.kind === 'remote' && !target.session.isOpen()) {
      return Promise.reject(new BackendFatalError(`SSH session to ${formatRemoteTarget(target.session.target)} is closed`));
    }

    const [file, args]: [string, string[]] = target.kind === 'local' ? [this.shell, ['-c', command]] : [this.ssh, [...target.session.sshArgs(), command]];
    const cwd = target.kind === 'local' ? target.cwd : undefined;

    return new Promise<CommandResult>((resolve, reject) => {
      const started = Date.now();
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let interrupted = false;
      let closed = false;

      if (options.signal?.aborted) {
        resolve({ exitCode: null, stdout, stderr, timedOut, interrupted: true, durationMs: 0 });
        return;
      }

      const child = spawn(file, args, { cwd, detached: true, stdio: ['pipe', 'pipe', 'pipe'] });

      child.stdout?.on('data', (chunk: Buffer) => {
        if (stdout.length < MAX_OUTPUT_CHARS) stdout += chunk.toString('utf8');
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        if (stderr.length < MAX_OUTPUT_CHARS) stderr += chunk.toString('utf8');
      });
      // The command may exit without reading its input (EPIPE); keep the note, the exit status decides
      child.stdin?.on('error', (err) => {
        stderr += `\n[stdin] ${err.message}`;
      });

      if (options.input !== undefined) {
        child.stdin?.end(options.input);
      } else {
        child.stdin?.end();
      }

      const timer = setTimeout(() => {
        timedOut = true;
        terminate(child, () => closed);
      }, options.timeoutMs);

      const onAbort = (): void => {
        interrupted = true;
        terminate(child, () => closed);
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const cleanup = (): void => {
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
      };

      child.on('error', (err) => {
        cleanup();
        reject(new BackendFatalError(`Failed to start "${file}": ${err.message}`, err));
      });

      child.on('close', (code) => {
        closed = true;
        cleanup();
        const durationMs = Date.now() - started;

        if (target.kind === 'remote' && code === SSH_CONNECTION_FAILURE && !timedOut && !interrupted) {
          reject(new BackendFatalError(`SSH connection to ${formatRemoteTarget(target.session.target)} failed: ${stderr.trim() || 'exit status 255'}`));
          return;
        }

        resolve({
          exitCode: code,
          stdout: stdout.slice(0, MAX_OUTPUT_CHARS),
          stderr: stderr.slice(0, MAX_OUTPUT_CHARS),
          timedOut,
          interrupted,
          durationMs,
        });
      });
    });
  }
}

/**
 * SIGTERM the process group, escalating to SIGKILL after a grace period.
 * The group outlives its leader: a shell that already exited may have left
 * background jobs holding the output pipes, so signal until 'close'.
 */
function terminate(child: ChildProcess, isClosed: () => boolean): void {
  signalGroup(child, 'SIGTERM', isClosed);
  const escalation = setTimeout(() => signalGroup(child, 'SIGKILL', isClosed), KILL_GRACE_MS);
  escalation.unref();
  child.once('close', () => clearTimeout(escalation));
}

function signalGroup(child: ChildProcess, signal: NodeJS.Signals, isClosed: () => boolean): void {
  if (isClosed() || child.pid === undefined) return;
  try {
    process.kill(-child.pid, signal);
  } catch {
    // No such group: fall back to the direct child while it still runs
    if (child.exitCode === null && child.signalCode === null) child.kill(signal);
  }
}

import { spawn } from 'child_process';
import crypto from 'crypto';
import os from 'os';
import path from 'path';
import { BackendFatalError } from './errors';
import { formatRemoteTarget } from './remote-target';
import type { RemoteTarget } from './remote-target';
import type { RemoteSession } from './types';

export interface SshSessionOptions {
  /** Directory for the control socket (default: os.tmpdir()) */
  controlDir?: string;
  /** Seconds before giving up on the initial connection */
  connectTimeoutSec?: number;
}

/**
 * One authenticated SSH connection for the lifetime of an agent session.
 * `connect` starts an OpenSSH control master (prompting for credentials on
 * the terminal if needed); every command afterwards is multiplexed over it.
 */
export class SshSession implements RemoteSession {
  readonly controlPath: string;
  private open = false;
  private connectTimeoutSec: number;

  constructor(
    readonly target: RemoteTarget,
    options: SshSessionOptions = {},
  ) {
    const id = crypto.randomBytes(6).toString('hex');
    this.controlPath = path.join(options.controlDir ?? os.tmpdir(), `taskpilot-ssh-${id}.sock`);
    this.connectTimeoutSec = options.connectTimeoutSec ?? 15;
  }

  async connect(): Promise<void> {
    if (this.open) return;

    const args = ['-M', '-S', this.controlPath, '-o', 'ControlPersist=yes', '-o', `ConnectTimeout=${this.connectTimeoutSec}`, '-f', '-N', ...this.destinationArgs()];
    const code = await runSsh(args, 'inherit');
    if (code !== 0) {
      throw new BackendFatalError(`Could not open SSH session to ${formatRemoteTarget(this.target)} (ssh exited with ${code ?? 'a signal'})`);
    }
    this.open = true;
  }

  sshArgs(): string[] {
    return ['-S', this.controlPath, '-o', 'BatchMode=yes', ...this.destinationArgs()];
  }

  isOpen(): boolean {
    return this.open;
  }

  async close(): Promise<void> {
    if (!this.open) return;
    this.open = false;
    await runSsh(['-S', this.controlPath, '-O', 'exit', ...this.destinationArgs()], 'ignore');
  }

  private destinationArgs(): string[] {
    return ['-p', String(this.target.port), `${this.target.user}@${this.target.host}`];
  }
}

function runSsh(args: string[], stdio: 'inherit' | 'ignore'): Promise<number | null> {
  return new Promise((resolve, reject) => {
    const child = spawn('ssh', args, { stdio });
    child.on('error', (err) => reject(new BackendFatalError(`Failed to start ssh: ${err.message}`, err)));
    child.on('close', (code) => resolve(code));
  });
}

import { InvalidRemoteTargetError } from './errors';

export interface RemoteTarget {
  user: string;
  host: string;
  port: number;
}

export const DEFAULT_SSH_PORT = 22;

const TARGET_PATTERN = /^([A-Za-z0-9._-]+)@([A-Za-z0-9.-]+|\[[0-9A-Fa-f:]+\])(?::(\d{1,5}))?$/;

/** Parse `user@host` or `user@host:port` */
export function parseRemoteTarget(value: string): RemoteTarget {
  const match = TARGET_PATTERN.exec(value.trim());
  if (!match) throw new InvalidRemoteTargetError(value);

  const [, user = '', rawHost = '', rawPort] = match;
  const port = rawPort ? Number.parseInt(rawPort, 10) : DEFAULT_SSH_PORT;
  if (port < 1 || port > 65535) throw new InvalidRemoteTargetError(value);

  const host = rawHost.startsWith('[') ? rawHost.slice(1, -1) : rawHost;
  return { user, host, port };
}

export function formatRemoteTarget(target: RemoteTarget): string {
  const host = target.host.includes(':') ? `[${target.host}]` : target.host;
  return target.port === DEFAULT_SSH_PORT ? `${target.user}@${host}` : `${target.user}@${host}:${target.port}`;
}

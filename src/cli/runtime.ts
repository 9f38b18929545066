import { createLanguageModel } from '../agents/clients';
import type { LanguageModel } from '../agents/language-model';
import { WebSearchAgent } from '../agents/web-search-agent';
import { DuckDuckGoEngine, HttpPageFetcher, SearxngEngine } from '../search/engines';
import type { SearchEngine } from '../search/engines';
import { ProcessExecutionBackend } from '../execution/process-backend';
import { SshSession } from '../execution/ssh-session';
import { formatRemoteTarget } from '../execution/remote-target';
import type { RemoteTarget } from '../execution/remote-target';
import type { ExecutionTarget } from '../execution/types';
import { LocalFileOperator } from '../files/local-file-operator';
import { RemoteFileOperator } from '../files/remote-file-operator';
import type { FileOperator } from '../files/types';
import { SecurityGate } from '../orchestrator/security-gate';
import type { ToolEnvironment } from '../orchestrator/tool-dispatcher';
import type { Config } from '../config/validator';
import type { Logger } from '../utils/logger';

export interface RuntimeOptions {
  config: Config;
  logger: Logger;
  remote?: RemoteTarget;
  cwd?: string;
}

/** Collaborators of one session, built from configuration */
export interface Runtime {
  model: LanguageModel;
  tools: ToolEnvironment;
  /** `local` or `user@host[:port]` */
  target: string;
  isRoot: boolean;
  close(): Promise<void>;
}

export async function createRuntime(options: RuntimeOptions): Promise<Runtime> {
  const { config, logger } = options;
  const cwd = options.cwd ?? process.cwd();
  const backend = new ProcessExecutionBackend();

  const webSearch = new WebSearchAgent(createSearchEngine(config), new HttpPageFetcher(config.web_search.timeout_ms), {
    defaults: {
      maxIterations: config.web_search.max_iterations,
      maxSourcesPerIteration: config.web_search.max_sources,
      minConfidence: config.web_search.min_confidence,
    },
    maxContentLength: config.web_search.max_content_length,
    logger,
  });

  const securityGate = new SecurityGate({
    killSwitch: config.security.kill_switch,
    dangerousPatterns: config.security.dangerous_patterns,
    cautionPatterns: config.security.caution_patterns,
  });

  let target: ExecutionTarget;
  let files: FileOperator;
  let label: string;
  let isRoot: boolean;
  let commandTimeoutMs: number;
  let ssh: SshSession | undefined;

  if (options.remote) {
    ssh = new SshSession(options.remote);
    await ssh.connect();
    target = { kind: 'remote', session: ssh };
    commandTimeoutMs = config.execution.remote_timeout_ms;
    files = new RemoteFileOperator(backend, target, commandTimeoutMs);
    label = formatRemoteTarget(options.remote);
    isRoot = options.remote.user === 'root';
    logger.info('SSH session opened', { target: label });
  } else {
    target = { kind: 'local', cwd };
    commandTimeoutMs = config.execution.local_timeout_ms;
    files = new LocalFileOperator(cwd);
    label = 'local';
    isRoot = typeof process.getuid === 'function' && process.getuid() === 0;
  }

  return {
    model: createLanguageModel(config.model, logger),
    tools: { backend, target, files, webSearch, securityGate, commandTimeoutMs },
    target: label,
    isRoot,
    close: async () => {
      if (ssh) await ssh.close();
    },
  };
}

function createSearchEngine(config: Config): SearchEngine {
  return config.web_search.engine === 'searxng'
    ? new SearxngEngine(config.web_search.searxng_url, config.web_search.timeout_ms)
    : new DuckDuckGoEngine(config.web_search.timeout_ms);
}

import { Command } from 'commander';
import crypto from 'node:crypto';
import { loadConfig } from '../../config/loader';
import type { DeepPartial } from '../../config/loader';
import type { Config } from '../../config/validator';
import { Orchestrator } from '../../orchestrator/orchestrator';
import { ConsoleLogger } from '../../utils/logger';
import { CLILogger } from '../cli-logger';
import { InquirerUserInteraction } from '../interaction';
import { createRuntime } from '../runtime';
import type { Runtime } from '../runtime';
import { promptForGoal, promptForNextGoal } from '../prompts';
import { joinGoal, parseEngine, parseRemote, parseStepLimit, parseTimeoutSeconds } from '../validators';
import {
  formatAnalysis,
  formatError,
  formatInfo,
  formatInvocation,
  formatSessionReport,
  formatStep,
  formatToolResult,
  formatVerboseSection,
  formatWarning,
} from '../formatters';
import { PlanManager } from '../../orchestrator/plan-manager';

// ── Types ───────────────────────────────────────────────────────────────

export type RunCommandOptions = {
  remote?: string;
  stepLimit?: string;
  timeout?: string;
  remoteTimeout?: string;
  autonomous?: boolean;
  /** False when --no-analysis is given */
  analysis?: boolean;
  killSwitch?: boolean;
  engine?: string;
  model?: string;
  verbose?: boolean;
};

// ── Command registration ────────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Plan and carry out a goal with shell, file and web tools')
    .argument('[goal...]', 'What to do (prompted for when omitted)')
    .option('--remote <user@host[:port]>', 'Run commands and file operations on a remote host over SSH')
    .option('--step-limit <n>', 'Maximum model turns per goal')
    .option('--timeout <seconds>', 'Timeout for local commands')
    .option('--remote-timeout <seconds>', 'Timeout for remote commands')
    .option('--autonomous', 'Skip confirmations except for dangerous commands')
    .option('--no-analysis', 'Skip the deep analysis after a finished goal')
    .option('--kill-switch', 'Block every shell command')
    .option('--engine <name>', 'Model engine (openai, openrouter, gemini, ollama)')
    .option('--model <name>', 'Model name for the selected engine')
    .option('--verbose', 'Show detailed output')
    .action(async (goal: string[], options: RunCommandOptions) => {
      await executeRunCommand(joinGoal(goal), options, program.opts().verbose === true);
    });
}

// ── Main execution ──────────────────────────────────────────────────────

/** Build configuration overrides from the command-line flags */
export function buildOverrides(options: RunCommandOptions): DeepPartial<Config> {
  return {
    model: { engine: options.engine !== undefined ? parseEngine(options.engine) : undefined, model: options.model },
    agent: {
      mode: options.autonomous ? 'autonomous' : undefined,
      step_limit: options.stepLimit !== undefined ? parseStepLimit(options.stepLimit) : undefined,
      deep_analysis: options.analysis === false ? false : undefined,
    },
    execution: {
      local_timeout_ms: options.timeout !== undefined ? parseTimeoutSeconds(options.timeout, '--timeout') : undefined,
      remote_timeout_ms: options.remoteTimeout !== undefined ? parseTimeoutSeconds(options.remoteTimeout, '--remote-timeout') : undefined,
    },
    security: { kill_switch: options.killSwitch ? true : undefined },
  };
}

/**
 * Executes `taskpilot run`.
 *
 * The first Ctrl+C cancels whatever the session is blocked on (a prompt or a
 * running command); a second one exits immediately.
 */
export async function executeRunCommand(goalText: string, options: RunCommandOptions, globalVerbose = false): Promise<void> {
  let orchestrator: Orchestrator | undefined;
  let interrupted = false;

  const onSigint = (): void => {
    if (interrupted) {
      console.log(formatError('\nForce exit.'));
      process.exit(130);
    }
    interrupted = true;
    const cancelled = orchestrator?.interrupt() ?? false;
    console.log(formatWarning(cancelled ? '\nCtrl+C received. Cancelling the current operation...' : '\nCtrl+C received. Press Ctrl+C again to exit.'));
  };
  process.on('SIGINT', onSigint);

  let runtime: Runtime | undefined;
  try {
    const verbose = globalVerbose || Boolean(options.verbose);
    const config = loadConfig(buildOverrides(options));
    const remote = options.remote ? parseRemote(options.remote) : undefined;
    const goal = goalText || (await promptForGoal());

    const runId = crypto.randomUUID();
    const sink = config.logging.file ? new ConsoleLogger({ level: config.logging.level, prefix: runId.slice(0, 8), file: config.logging.file, console: false }) : undefined;
    const logger = new CLILogger(runId, verbose, sink);

    runtime = await createRuntime({ config, logger, remote });

    console.log('');
    console.log(formatStep(`Goal: ${goal}`));
    console.log(formatInfo(`target:     ${runtime.target}`));
    console.log(formatInfo(`model:      ${config.model.engine}/${config.model.model}`));
    console.log(formatInfo(`mode:       ${config.agent.mode}`));
    console.log(formatInfo(`step limit: ${config.agent.step_limit}`));
    if (config.security.kill_switch) console.log(formatWarning('kill switch: every command will be blocked'));
    console.log('');

    orchestrator = new Orchestrator({
      model: runtime.model,
      interaction: new InquirerUserInteraction(),
      tools: runtime.tools,
      mode: config.agent.mode,
      stepLimit: config.agent.step_limit,
      maxResponseAttempts: config.agent.max_response_attempts,
      contextWindow: { maxMessages: config.context.max_messages, maxTokens: config.context.max_tokens },
      target: runtime.target,
      isRoot: runtime.isRoot,
      cwd: process.cwd(),
      runId,
      storageRoot: config.storage.root_dir,
      deepAnalysis: config.agent.deep_analysis,
      logger,
    });

    const planManager = new PlanManager();
    const events = orchestrator.getEvents();
    events.on('plan', (plan) => {
      if (verbose) console.log(formatVerboseSection('Plan', planManager.renderPlan(plan)));
    });
    events.on('invocation', (invocation, step) => {
      interrupted = false;
      console.log(formatInvocation(invocation, step));
    });
    events.on('result', (result) => console.log(formatToolResult(result, verbose)));
    events.on('modeChange', (mode) => console.log(formatWarning(`Mode switched to ${mode}`)));

    let report = await orchestrator.run(goal);
    for (;;) {
      console.log(formatSessionReport(report, { verbose }));
      if (report.analysis) console.log(formatAnalysis(report.analysis));
      if (report.status !== 'finished' || !process.stdin.isTTY) break;

      console.log('');
      const next = await promptForNextGoal();
      if (!next) break;
      interrupted = false;
      report = await orchestrator.continueWith(next);
    }

    if (report.status === 'aborted') process.exitCode = 1;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(formatError(msg));
    process.exitCode = 1;
  } finally {
    process.removeListener('SIGINT', onSigint);
    if (runtime) await runtime.close();
  }
}

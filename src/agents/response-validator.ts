import { extractJson } from './json-extractor';
import { ToolInvocationSchema, TOOL_ALIASES, TOOL_NAMES } from './tool-schemas';
import type { ToolInvocation } from './tool-schemas';
import type { ChatMessage, LanguageModel } from './language-model';
import { buildCorrectionPrompt } from './prompts/correction';
import { UnrecoverableResponseError } from '../orchestrator/errors';
import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

export type ParseOutcome = { ok: true; invocation: ToolInvocation } | { ok: false; defect: string };

export interface ValidatedResponse {
  invocation: ToolInvocation;
  /** Raw text of the reply that validated */
  raw: string;
  /** Number of replies inspected, including the valid one */
  attempts: number;
}

export interface ResponseValidatorOptions {
  /** Total replies inspected before giving up (default: 3) */
  maxAttempts?: number;
  logger?: Logger;
}

/**
 * Turns raw model output into a typed tool invocation. Malformed replies are
 * answered with a corrective prompt describing the defect, up to a fixed
 * number of attempts; the corrective exchange stays local to this call.
 */
export class ResponseValidator {
  private readonly maxAttempts: number;
  private readonly logger: Logger;

  constructor(
    private model: LanguageModel,
    options: ResponseValidatorOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.logger = options.logger ?? silentLogger;
  }

  getMaxAttempts(): number {
    return this.maxAttempts;
  }

  /** Ask the model for the next turn and validate it */
  async obtain(conversation: readonly ChatMessage[]): Promise<ValidatedResponse> {
    const raw = await this.model.send(conversation);
    return this.validate(raw, conversation);
  }

  /**
   * Validate a reply, asking the model to correct itself on failure.
   * @throws UnrecoverableResponseError after `maxAttempts` invalid replies
   */
  async validate(rawModelOutput: string, conversation: readonly ChatMessage[]): Promise<ValidatedResponse> {
    const transcript: ChatMessage[] = [...conversation];
    const defects: string[] = [];
    let raw = rawModelOutput;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const outcome = this.parse(raw);
      if (outcome.ok) {
        if (attempt > 1) this.logger.info('Model corrected its reply', { attempt });
        return { invocation: outcome.invocation, raw, attempts: attempt };
      }

      defects.push(outcome.defect);
      this.logger.warn('Invalid model reply', { attempt, defect: outcome.defect });

      if (attempt === this.maxAttempts) break;

      transcript.push({ role: 'assistant', content: raw });
      transcript.push({ role: 'user', content: buildCorrectionPrompt({ defect: outcome.defect, attempt, maxAttempts: this.maxAttempts }) });
      raw = await this.model.send(transcript);
    }

    throw new UnrecoverableResponseError(this.maxAttempts, defects);
  }

  /** Pure parse step: no model calls */
  parse(raw: string): ParseOutcome {
    return parseToolInvocation(raw);
  }
}

export function parseToolInvocation(raw: string): ParseOutcome {
  const extracted = extractJson(raw);
  if (!extracted.ok) {
    return { ok: false, defect: `No JSON object could be read from the reply (${extracted.attempts.join('; ')})` };
  }

  let value = extracted.value;
  if (Array.isArray(value)) {
    if (value.length !== 1) {
      return { ok: false, defect: `Expected exactly one tool call per reply, got a list of ${value.length}` };
    }
    value = value[0];
  }

  if (!isRecord(value)) {
    return { ok: false, defect: `Expected a JSON object describing one tool call, got ${value === null ? 'null' : typeof value}` };
  }

  const normalized = normalize(value);
  if (typeof normalized.tool !== 'string' || !normalized.tool) {
    return { ok: false, defect: 'The object has no "tool" field naming the tool to call' };
  }

  const name = normalized.tool;
  if (!TOOL_NAMES.some((t) => t === name)) {
    return { ok: false, defect: `Unknown tool "${name}". Valid tools: ${TOOL_NAMES.join(', ')}` };
  }

  const parsed = ToolInvocationSchema.safeParse(normalized);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return { ok: false, defect: `Invalid arguments for "${name}": ${problems.join('; ')}` };
  }

  return { ok: true, invocation: parsed.data };
}

/**
 * Accept `{tool, args}`, `{tool, arguments}`, `{tool, parameters}` and the
 * flat `{tool, ...args}` form; resolve common tool-name aliases.
 */
function normalize(value: Record<string, unknown>): Record<string, unknown> {
  const { tool, args, arguments: altArgs, parameters, ...rest } = value;
  const nested = [args, altArgs, parameters].find(isRecord);
  const name = typeof tool === 'string' ? (TOOL_ALIASES[tool.trim().toLowerCase()] ?? tool.trim()) : tool;
  return { tool: name, args: nested ?? rest };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

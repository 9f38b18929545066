/**
 * System prompt pinned at the top of every execution conversation.
 *
 * It fixes the reply contract (one JSON tool call per turn), lists the tools,
 * and describes where commands run.
 */

import { TOOL_DESCRIPTIONS, TOOL_NAMES } from '../tool-schemas';

export interface SystemPromptInput {
  /** `local` or `user@host[:port]` */
  target: string;
  /** Commands run as root on the target */
  isRoot?: boolean;
  /** Working directory of local runs */
  cwd?: string;
}

export function buildSystemPrompt(input: SystemPromptInput): string {
  const tools = TOOL_NAMES.map((name) => `- ${name} ${TOOL_DESCRIPTIONS[name]}`).join('\n');
  const where =
    input.target === 'local'
      ? `Commands and file operations run on the local machine${input.cwd ? ` in ${input.cwd}` : ''}.`
      : `Commands and file operations run on the remote host ${input.target} over SSH. Paths refer to that host.`;
  const privileges = input.isRoot ? '\nYou are running as root: do not prefix commands with sudo.' : '';

  return `You are an autonomous operator that completes a user's goal step by step on a computer.

### ENVIRONMENT
${where}${privileges}

### TOOLS
${tools}

### RULES
- Reply with EXACTLY ONE JSON object per turn: {"tool": "<name>", "args": {...}}.
- No prose, no markdown, no code fences around the JSON.
- Follow the current plan. Mark a step in_progress before working on it and
  completed, failed or skipped (with a short result) when you are done with it.
- Every tool result comes back as a "tool" message. Read it before the next call.
- If the user declines an action, read the justification and adapt; do not retry
  the same action unchanged.
- Prefer non-interactive commands (for example "apt-get install -y").
- Call "finish" with a summary only when every plan step is resolved.
`;
}

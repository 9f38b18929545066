import { z } from 'zod';
import { STEP_STATUSES } from '../orchestrator/plan-manager';

const nonEmpty = z.string().trim().min(1, 'must not be empty');
const lineNumber = z.coerce.number().int().positive();

export const EDIT_ACTIONS = ['replace', 'insert_after', 'insert_before', 'delete_line'] as const;

const tool = <N extends string, A extends z.ZodTypeAny>(name: N, args: A) => z.object({ tool: z.literal(name), args });

export const ToolInvocationSchema = z.discriminatedUnion('tool', [
  tool('execute_command', z.object({ command: nonEmpty, explain: z.string().optional() })),
  tool('read_file', z.object({ path: nonEmpty, start_line: lineNumber.optional(), end_line: lineNumber.optional() })),
  tool('write_file', z.object({ path: nonEmpty, content: z.string() })),
  tool(
    'edit_file',
    z
      .object({ path: nonEmpty, action: z.enum(EDIT_ACTIONS), search: nonEmpty, replace: z.string().optional() })
      .refine((a) => a.action === 'delete_line' || a.replace !== undefined, { message: 'replace is required unless action is delete_line', path: ['replace'] }),
  ),
  tool('copy_file', z.object({ source: nonEmpty, destination: nonEmpty, overwrite: z.boolean().optional() })),
  tool('delete_file', z.object({ path: nonEmpty, backup: z.boolean().optional() })),
  tool('list_directory', z.object({ path: z.string().trim().default('.'), recursive: z.boolean().optional(), pattern: z.string().optional() })),
  tool('web_search', z.object({ query: nonEmpty })),
  tool('update_plan_step', z.object({ step: z.coerce.number().int().positive(), status: z.enum(STEP_STATUSES), result: z.string().optional() })),
  tool('ask_user', z.object({ question: nonEmpty })),
  tool('finish', z.object({ summary: nonEmpty })),
]);

export type ToolInvocation = z.infer<typeof ToolInvocationSchema>;
export type ToolName = ToolInvocation['tool'];
export type ToolArgs<N extends ToolName> = Extract<ToolInvocation, { tool: N }>['args'];
export type EditAction = (typeof EDIT_ACTIONS)[number];

export const TOOL_NAMES: readonly ToolName[] = ToolInvocationSchema.options.map((o) => o.shape.tool.value);

/** Names models commonly use for the same tools */
export const TOOL_ALIASES: Readonly<Record<string, ToolName>> = {
  bash: 'execute_command',
  shell: 'execute_command',
  run_command: 'execute_command',
  read: 'read_file',
  write: 'write_file',
  edit: 'edit_file',
  search: 'web_search',
  ask: 'ask_user',
  done: 'finish',
};

/** One-line descriptions used in the system prompt */
export const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  execute_command: '{"command": "<shell command>", "explain": "<why>"}: run a shell command on the target host',
  read_file: '{"path": "...", "start_line": 1, "end_line": 50}: read a file, optionally a line range',
  write_file: '{"path": "...", "content": "..."}: create or overwrite a file',
  edit_file: '{"path": "...", "action": "replace|insert_after|insert_before|delete_line", "search": "<whole line>", "replace": "..."}: edit lines matching `search`',
  copy_file: '{"source": "...", "destination": "...", "overwrite": false}: copy a file',
  delete_file: '{"path": "...", "backup": true}: delete a file, optionally keeping a timestamped backup',
  list_directory: '{"path": ".", "recursive": false, "pattern": "*.ts"}: list directory entries',
  web_search: '{"query": "..."}: search the web and return relevant sources with extracted text',
  update_plan_step: '{"step": 1, "status": "in_progress|completed|failed|skipped", "result": "..."}: record plan progress',
  ask_user: '{"question": "..."}: ask the user a question and wait for the answer',
  finish: '{"summary": "..."}: finish the goal once every plan step is resolved',
};

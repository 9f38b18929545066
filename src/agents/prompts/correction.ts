import { TOOL_NAMES } from '../tool-schemas';

/**
 * Follow-up sent after a reply that could not be turned into a tool call.
 * It names the exact defect so the model can fix that and nothing else.
 */
export function buildCorrectionPrompt(input: { defect: string; attempt: number; maxAttempts: number }): string {
  return `ATTENTION: YOUR PREVIOUS REPLY (ATTEMPT ${input.attempt}/${input.maxAttempts}) WAS NOT A VALID TOOL CALL.
Problem: ${input.defect}

Reply ONLY with one JSON object of the form {"tool": "<name>", "args": {...}}.
No prose, no code fences, exactly one tool call.
Valid tools: ${TOOL_NAMES.join(', ')}`;
}

export function buildPlanCorrectionPrompt(input: { defect: string; attempt: number; maxAttempts: number }): string {
  return `ATTENTION: YOUR PREVIOUS PLAN (ATTEMPT ${input.attempt}/${input.maxAttempts}) COULD NOT BE USED.
Problem: ${input.defect}

Reply ONLY with a JSON object of the form {"steps": [{"description": "...", "command": "..."}]} containing at least one step.`;
}

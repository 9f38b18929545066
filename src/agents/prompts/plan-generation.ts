/**
 * Prompts for drafting and revising the execution plan.
 */

export const PLANNER_SYSTEM_PROMPT = `You are a careful planner. You break a goal into a short sequence of concrete,
verifiable steps that an operator with shell and file access will carry out.
You answer with JSON only.`;

const FORMAT = `### OUTPUT FORMAT

Return ONLY valid JSON. No markdown. No explanation.

{
  "steps": [
    { "description": "Check which web server is installed", "command": "nginx -v" },
    { "description": "Write the site configuration" }
  ]
}

Guidelines:
- 1 to 12 steps, in execution order.
- "command" is optional: include it only when one shell command clearly does the step.
- Each description is one short sentence.`;

export function buildPlanPrompt(input: { goal: string; target: string; background?: string }): string {
  const background = input.background ? `\n### WORK ALREADY DONE IN THIS SESSION\n${input.background}\n` : '';
  return `Draft a plan for the goal below.

### GOAL
${input.goal}

### TARGET
${input.target}
${background}
${FORMAT}
`;
}

export function buildPlanRevisionPrompt(input: { goal: string; currentPlan: string; feedback: string }): string {
  return `The user reviewed the plan and asked for changes. Produce a complete replacement plan.

### GOAL
${input.goal}

### CURRENT PLAN
${input.currentPlan}

### USER FEEDBACK
${input.feedback}

${FORMAT}
`;
}

/**
 * Prompt for the post-run analysis of a finished session.
 */

export function buildDeepAnalysisPrompt(input: { goal: string; plan: string; actions: string; summary: string; transcript: string }): string {
  return `You are reviewing a finished automation session. Judge honestly whether the goal was achieved.

### GOAL
${input.goal}

### FINAL PLAN
${input.plan}

### ACTIONS
${input.actions}

### OPERATOR SUMMARY
${input.summary}

### RECENT CONVERSATION
${input.transcript}

### OUTPUT FORMAT

Return ONLY valid JSON. No markdown. No explanation.

{
  "goal_achievement": "Was the goal met, and to what extent",
  "execution_summary": "What was done, in order",
  "successes": ["..."],
  "failures": ["..."],
  "technical_analysis": "Notable technical details, risks and side effects",
  "recommendations": ["..."],
  "verdict": "completed | partially-completed | failed"
}
`;
}

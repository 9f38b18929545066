import { PlanManager } from '../orchestrator/plan-manager';
import type { Plan } from '../orchestrator/plan-manager';
import { PlanParseError, UnrecoverableResponseError } from '../orchestrator/errors';
import type { ChatMessage, LanguageModel } from './language-model';
import { PLANNER_SYSTEM_PROMPT, buildPlanPrompt, buildPlanRevisionPrompt } from './prompts/plan-generation';
import { buildPlanCorrectionPrompt } from './prompts/correction';
import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

export interface PlanDrafterOptions {
  maxAttempts?: number;
  /** Execution target described to the planner */
  target?: string;
  logger?: Logger;
}

/**
 * Asks the model for a plan and turns the draft into a Plan, feeding parse
 * failures back as corrective prompts up to `maxAttempts` model calls.
 */
export class PlanDrafter {
  private readonly maxAttempts: number;
  private readonly target: string;
  private readonly logger: Logger;

  constructor(
    private model: LanguageModel,
    private planManager: PlanManager = new PlanManager(),
    options: PlanDrafterOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.target = options.target ?? 'local';
    this.logger = options.logger ?? silentLogger;
  }

  /** @param background what earlier goals of the session already did */
  async draft(goal: string, background?: string): Promise<Plan> {
    const prompt = buildPlanPrompt({ goal, target: this.target, background });
    return this.attempt(prompt, (draft) => this.planManager.createPlan(goal, draft));
  }

  async revise(plan: Plan, feedback: string): Promise<Plan> {
    const prompt = buildPlanRevisionPrompt({ goal: plan.goal, currentPlan: this.planManager.renderPlan(plan), feedback });
    return this.attempt(prompt, (draft) => this.planManager.revise(plan, feedback, draft));
  }

  private async attempt(prompt: string, build: (draft: string) => Plan): Promise<Plan> {
    const transcript: ChatMessage[] = [
      { role: 'system', content: PLANNER_SYSTEM_PROMPT },
      { role: 'user', content: prompt },
    ];
    const defects: string[] = [];

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const raw = await this.model.send(transcript);
      try {
        const plan = build(raw);
        this.logger.debug('Plan drafted', { steps: plan.steps.length, attempt });
        return plan;
      } catch (err) {
        if (!(err instanceof PlanParseError)) throw err;
        defects.push(err.message);
        this.logger.warn('Unusable plan draft', { attempt, defect: err.message });
        transcript.push({ role: 'assistant', content: raw });
        transcript.push({ role: 'user', content: buildPlanCorrectionPrompt({ defect: err.message, attempt, maxAttempts: this.maxAttempts }) });
      }
    }

    throw new UnrecoverableResponseError(this.maxAttempts, defects);
  }
}

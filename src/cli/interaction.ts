import { formatConfirmation, formatInfo, formatVerboseSection, formatWarning } from './formatters';
import { promptWithSignal } from './prompts';
import type { ConfirmationDecision, ConfirmationRequest, PlanReviewDecision, UserInteraction } from '../orchestrator/interaction';
import type { Plan } from '../orchestrator/plan-manager';

type Output = (line: string) => void;

/**
 * Terminal implementation of the user-facing prompts. In a non-interactive
 * terminal every confirmation is declined and plans are accepted as drafted.
 */
export class InquirerUserInteraction implements UserInteraction {
  constructor(
    private out: Output = (line) => console.log(line),
    private interactive: boolean = Boolean(process.stdin.isTTY),
  ) {}

  async confirm(request: ConfirmationRequest, signal?: AbortSignal): Promise<ConfirmationDecision> {
    this.out('');
    this.out(formatConfirmation(request));

    if (!this.interactive) {
      this.out(formatWarning('Non-interactive terminal detected. Declining.'));
      return { approved: false, justification: 'The terminal is non-interactive, so the action could not be confirmed' };
    }

    const choices = [
      { name: 'Yes', value: 'yes' },
      ...(request.offerAutonomous ? [{ name: 'Yes, and stop asking (autonomous mode)', value: 'autonomous' }] : []),
      { name: 'No', value: 'no' },
    ];
    const { choice } = await promptWithSignal<{ choice: string }>([{ type: 'list', name: 'choice', message: `${request.title}?`, choices }], signal);

    if (choice === 'yes') return { approved: true };
    if (choice === 'autonomous') return { approved: true, switchToAutonomous: true };

    const { justification } = await promptWithSignal<{ justification: string }>(
      [{ type: 'input', name: 'justification', message: 'Why not? (the agent reads this and adapts)' }],
      signal,
    );
    return { approved: false, justification: justification.trim() };
  }

  async ask(question: string, signal?: AbortSignal): Promise<string> {
    this.out('');
    const { answer } = await promptWithSignal<{ answer: string }>([{ type: 'input', name: 'answer', message: question }], signal);
    return answer;
  }

  async reviewPlan(plan: Plan, rendered: string, signal?: AbortSignal): Promise<PlanReviewDecision> {
    this.out('');
    this.out(formatVerboseSection('Proposed plan', rendered));

    if (!this.interactive) {
      this.out(formatInfo('Non-interactive terminal detected. Accepting the plan.'));
      return { action: 'accept' };
    }

    const { choice } = await promptWithSignal<{ choice: string }>(
      [
        {
          type: 'list',
          name: 'choice',
          message: `Accept this ${plan.steps.length}-step plan?`,
          choices: [
            { name: 'Accept', value: 'accept' },
            { name: 'Accept and run autonomously', value: 'autonomous' },
            { name: 'Revise', value: 'revise' },
          ],
        },
      ],
      signal,
    );

    if (choice === 'accept') return { action: 'accept' };
    if (choice === 'autonomous') return { action: 'accept', switchToAutonomous: true };

    const { feedback } = await promptWithSignal<{ feedback: string }>(
      [
        {
          type: 'input',
          name: 'feedback',
          message: 'What should change?',
          validate: (input: string) => input.trim().length > 0 || 'Describe the change you want',
        },
      ],
      signal,
    );
    return { action: 'revise', feedback: feedback.trim() };
  }
}

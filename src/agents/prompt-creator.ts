import { z } from 'zod';
import { extractJson } from './json-extractor';
import type { ChatMessage, LanguageModel } from './language-model';
import { PROMPT_CREATOR_SYSTEM_PROMPT, buildPromptCreatorOpening } from './prompts/prompt-creation';
import { UnrecoverableResponseError } from '../orchestrator/errors';
import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

const TurnSchema = z.object({
  prompt_draft: z.string().trim().min(1),
  question: z
    .string()
    .nullish()
    .transform((q) => (q && q.trim() ? q.trim() : null)),
});

export interface PromptCreatorTurn {
  draft: string;
  question: string | null;
}

/** Answers a question about the draft; null or an empty answer ends the interview */
export type AnswerFn = (question: string, draft: string) => Promise<string | null>;

export interface PromptCreatorOptions {
  maxRounds?: number;
  logger?: Logger;
}

/** Interviews the user through the model until the task prompt is ready */
export class PromptCreator {
  private readonly maxRounds: number;
  private readonly logger: Logger;

  constructor(
    private model: LanguageModel,
    options: PromptCreatorOptions = {},
  ) {
    this.maxRounds = options.maxRounds ?? 20;
    this.logger = options.logger ?? silentLogger;
  }

  async create(idea: string, answer: AnswerFn): Promise<string> {
    const transcript: ChatMessage[] = [
      { role: 'system', content: PROMPT_CREATOR_SYSTEM_PROMPT },
      { role: 'user', content: buildPromptCreatorOpening(idea) },
    ];
    const defects: string[] = [];
    let draft: string | undefined;

    for (let round = 1; round <= this.maxRounds; round++) {
      const raw = await this.model.send(transcript);
      transcript.push({ role: 'assistant', content: raw });

      const turn = parseTurn(raw);
      if (!turn) {
        defects.push(`round ${round}: reply was not {"prompt_draft", "question"} JSON`);
        transcript.push({ role: 'user', content: 'Reply ONLY with {"prompt_draft": "...", "question": "..." or null}.' });
        continue;
      }

      draft = turn.draft;
      if (!turn.question) return draft;

      const reply = await answer(turn.question, draft);
      if (!reply || !reply.trim()) return draft;
      transcript.push({ role: 'user', content: reply.trim() });
    }

    this.logger.info('Prompt creator reached the round limit', { rounds: this.maxRounds });
    if (draft) return draft;
    throw new UnrecoverableResponseError(this.maxRounds, defects);
  }
}

export function parseTurn(raw: string): PromptCreatorTurn | null {
  const extracted = extractJson(raw);
  if (!extracted.ok) return null;
  const parsed = TurnSchema.safeParse(extracted.value);
  return parsed.success ? { draft: parsed.data.prompt_draft, question: parsed.data.question } : null;
}

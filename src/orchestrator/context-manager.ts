import type { ChatMessage, ChatRole } from '../agents/language-model';

export interface ContextMessage {
  role: ChatRole;
  content: string;
  /** Structured data kept alongside the text (tool results, invocations) */
  payload?: unknown;
  /** Pinned messages are never evicted */
  pinned?: boolean;
}

export interface ContextWindowOptions {
  /** Maximum number of non-pinned messages kept (default: 20) */
  maxMessages?: number;
  /** Maximum estimated token weight of the whole snapshot (default: 24000) */
  maxTokens?: number;
}

export interface ContextMetrics {
  appended: number;
  evicted: number;
  retained: number;
  estimatedTokens: number;
}

const CHARS_PER_TOKEN = 4;
const DIGEST_MAX_BULLETS = 20;
const DIGEST_MAX_CHARS = 5000;
const DIGEST_LINE_CHARS = 160;

/**
 * Ordered conversation log with a goal-pinned sliding window.
 *
 * The snapshot sent to the model is: pinned messages (system prompt, goals)
 * in their original order, a digest of evicted messages, the current plan
 * snapshot, then the retained recent messages.
 */
export class ContextManager {
  private messages: ContextMessage[] = [];
  private planSnapshot?: string;
  private digest: string[] = [];
  private appendedCount = 0;
  private evictedCount = 0;
  private readonly maxMessages: number;
  private readonly maxTokens: number;

  constructor(options: ContextWindowOptions = {}) {
    this.maxMessages = options.maxMessages ?? 20;
    this.maxTokens = options.maxTokens ?? 24_000;
  }

  append(message: ContextMessage): void {
    this.messages.push({ ...message });
    this.appendedCount++;
  }

  /** Append a pinned message (system prompt, goal) */
  pin(role: ChatRole, content: string): void {
    this.append({ role, content, pinned: true });
  }

  /** Replace the pinned plan snapshot slot */
  setPlanSnapshot(text: string | undefined): void {
    this.planSnapshot = text;
  }

  getPlanSnapshot(): string | undefined {
    return this.planSnapshot;
  }

  /**
   * Drop the oldest non-pinned messages until both the message bound and the
   * token estimate fit. Returns the number of messages evicted.
   */
  enforceWindow(): number {
    let evicted = 0;

    while (this.unpinnedCount() > this.maxMessages || (this.estimateTokens() > this.maxTokens && this.unpinnedCount() > 1)) {
      const index = this.messages.findIndex((m) => !m.pinned);
      if (index < 0) break;
      const [removed] = this.messages.splice(index, 1);
      if (removed) this.remember(removed);
      evicted++;
    }

    this.evictedCount += evicted;
    return evicted;
  }

  /** Messages in the order the model should see them */
  snapshot(): ChatMessage[] {
    const pinned = this.messages.filter((m) => m.pinned);
    const recent = this.messages.filter((m) => !m.pinned);
    const result: ChatMessage[] = pinned.map(toChat);

    if (this.digest.length > 0) {
      result.push({ role: 'system', content: `[Earlier conversation, condensed]\n${this.digest.join('\n')}` });
    }
    if (this.planSnapshot) {
      result.push({ role: 'system', content: this.planSnapshot });
    }

    return [...result, ...recent.map(toChat)];
  }

  /** Read-only view of the retained log, including payloads */
  getMessages(): readonly ContextMessage[] {
    return this.messages.map((m) => ({ ...m }));
  }

  getMetrics(): ContextMetrics {
    return {
      appended: this.appendedCount,
      evicted: this.evictedCount,
      retained: this.messages.length,
      estimatedTokens: this.estimateTokens(),
    };
  }

  estimateTokens(): number {
    const chars = this.snapshot().reduce((sum, m) => sum + m.content.length, 0);
    return Math.ceil(chars / CHARS_PER_TOKEN);
  }

  private unpinnedCount(): number {
    return this.messages.filter((m) => !m.pinned).length;
  }

  private remember(message: ContextMessage): void {
    const firstLine = message.content.split('\n').find((line) => line.trim()) ?? '';
    const line = firstLine.length > DIGEST_LINE_CHARS ? `${firstLine.slice(0, DIGEST_LINE_CHARS)}...` : firstLine;
    this.digest.push(`- ${message.role}: ${line.trim()}`);

    while (this.digest.length > DIGEST_MAX_BULLETS || this.digest.join('\n').length > DIGEST_MAX_CHARS) {
      this.digest.shift();
    }
  }
}

function toChat(message: ContextMessage): ChatMessage {
  return { role: message.role, content: message.content };
}

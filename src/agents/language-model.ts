export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Capability shared by every model backend. Calls are stateless: the caller
 * supplies the whole windowed conversation each time and receives raw text.
 */
export interface LanguageModel {
  readonly name: string;
  send(messages: readonly ChatMessage[]): Promise<string>;
}

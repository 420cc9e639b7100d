import type { ChatMessage } from '../../types/index.js';

/**
 * Conversation history of one negotiation. Built from the persisted
 * transcript on each call and written back with the round, so no chat state
 * outlives a request or leaks between sessions.
 */
export class ConversationContext {
  private readonly messages: ChatMessage[];

  constructor(
    history: readonly ChatMessage[],
    private readonly limit: number
  ) {
    this.messages = history.filter((m) => m.role !== 'system').map((m) => ({ ...m }));
  }

  add(role: ChatMessage['role'], content: string): this {
    if (role !== 'system' && content.trim()) {
      this.messages.push({ role, content });
    }
    return this;
  }

  /** Prompt-ready messages: the system prompt followed by the retained history. */
  toMessages(systemPrompt: string, ...pending: ChatMessage[]): ChatMessage[] {
    return [{ role: 'system', content: systemPrompt }, ...this.snapshot(), ...pending];
  }

  /** The most recent `limit` messages, oldest first. */
  snapshot(): ChatMessage[] {
    const start = Math.max(0, this.messages.length - this.limit);
    return this.messages.slice(start).map((m) => ({ ...m }));
  }

  get size(): number {
    return Math.min(this.messages.length, this.limit);
  }
}

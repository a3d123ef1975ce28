export type ChatRole = "user" | "assistant";

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
  /** Table images shown with an assistant reply. */
  readonly images?: readonly string[];
}

/**
 * Append-only record of a chat session.
 */
export class ConversationLog {
  private entries: ChatMessage[] = [];

  append(message: ChatMessage): void {
    this.entries.push(
      Object.freeze({
        ...message,
        images: message.images ? Object.freeze([...message.images]) : undefined,
      }),
    );
  }

  messages(): readonly ChatMessage[] {
    return [...this.entries];
  }

  get length(): number {
    return this.entries.length;
  }
}

/**
 * Per-conversation context. Holds the id of the last completed response so the
 * next request can continue the same thread via `previous_response_id`.
 * One instance per conversation; nothing is shared between conversations.
 */
export class ConversationSession {
  readonly conversationId: string;
  private lastResponseId: string | null;

  constructor(params: { conversationId?: string; previousResponseId?: string | null } = {}) {
    this.conversationId = params.conversationId?.trim() || "default";
    this.lastResponseId = params.previousResponseId?.trim() || null;
  }

  get previousResponseId(): string | null {
    return this.lastResponseId;
  }

  advance(responseId: string): void {
    const normalized = responseId.trim();
    if (normalized) {
      this.lastResponseId = normalized;
    }
  }

  reset(): void {
    this.lastResponseId = null;
  }
}

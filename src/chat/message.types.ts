export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

/**
 * Ordered, append-only log of a session's turns. Windowing (e.g. the last
 * four messages for classification) is always a read-time slice.
 */
export type ConversationHistory = readonly ChatMessage[];

export function isChatMessage(value: unknown): value is ChatMessage {
  if (typeof value !== 'object' || value === null || !('role' in value) || !('content' in value)) {
    return false;
  }
  return (value.role === 'user' || value.role === 'assistant') && typeof value.content === 'string';
}

import type { HistoryMessage } from "../advisor/types.js";

export type MessageRole = "user" | "assistant";

export interface SaveMessageInput {
  conversationId: string;
  role: MessageRole;
  content: string;
  summary?: string | null;
  rewrittenQuery?: string | null;
}

export interface ConversationRecord {
  id: string;
  excludedIds: string[];
}

export interface StoredMessage extends HistoryMessage {
  role: MessageRole;
  rewrittenQuery?: string | null;
}

/**
 * Persistence consumed by the chat service. The document store that backs it
 * lives outside this package.
 */
export interface ConversationStore {
  getConversation(conversationId: string): Promise<ConversationRecord | null>;
  getConversationMessages(conversationId: string): Promise<StoredMessage[]>;
  saveMessage(input: SaveMessageInput): Promise<void>;
  updateExcludedIds(conversationId: string, excludedIds: string[]): Promise<void>;
}

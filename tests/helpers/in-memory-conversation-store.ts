import type {
  ConversationRecord,
  ConversationStore,
  SaveMessageInput,
  StoredMessage
} from "../../src/modules/chat/conversation-store.js";

export type StoreOperation =
  | { op: "updateExcludedIds"; conversationId: string; excludedIds: string[] }
  | { op: "saveMessage"; input: SaveMessageInput };

export class InMemoryConversationStore implements ConversationStore {
  readonly operations: StoreOperation[] = [];

  private readonly conversations = new Map<string, ConversationRecord>();

  private readonly messages = new Map<string, StoredMessage[]>();

  seed(conversationId: string, excludedIds: string[] = [], messages: StoredMessage[] = []): void {
    this.conversations.set(conversationId, { id: conversationId, excludedIds: [...excludedIds] });
    this.messages.set(conversationId, [...messages]);
  }

  async getConversation(conversationId: string): Promise<ConversationRecord | null> {
    return this.conversations.get(conversationId) ?? null;
  }

  async getConversationMessages(conversationId: string): Promise<StoredMessage[]> {
    return [...(this.messages.get(conversationId) ?? [])];
  }

  async saveMessage(input: SaveMessageInput): Promise<void> {
    this.operations.push({ op: "saveMessage", input });
    const list = this.messages.get(input.conversationId) ?? [];
    list.push({
      role: input.role,
      content: input.content,
      summary: input.summary ?? null,
      rewrittenQuery: input.rewrittenQuery ?? null
    });
    this.messages.set(input.conversationId, list);
  }

  async updateExcludedIds(conversationId: string, excludedIds: string[]): Promise<void> {
    this.operations.push({ op: "updateExcludedIds", conversationId, excludedIds: [...excludedIds] });
    this.conversations.set(conversationId, { id: conversationId, excludedIds: [...excludedIds] });
  }
}

import type { ConversationStore } from '../conversation_store.js';
import {
  AddMessageSchema,
  GetMessagesSchema,
  ListConversationsSchema,
  SeedTitleSchema,
  ThreadIdSchema,
  deriveTitle,
  nextTitle,
  validate,
  type Conversation,
  type Message,
} from '../conversation.js';

interface Entry {
  conversation: Conversation;
  messages: Message[];
}

/**
 * Process-local conversation store with the same uniqueness, ordering and
 * validation rules as the Postgres store.
 */
export function createInMemoryStore(opts: { now?: () => Date } = {}): ConversationStore {
  const now = opts.now ?? (() => new Date());
  const threads = new Map<string, Entry>();
  let conversationSeq = 0;
  let messageSeq = 0;

  // Monotonic per store so ordering never depends on clock resolution.
  let lastStamp = 0;
  function stamp(): Date {
    lastStamp = Math.max(now().getTime(), lastStamp + 1);
    return new Date(lastStamp);
  }

  function resolve(threadId: string, seedTitle?: string): Entry {
    const existing = threads.get(threadId);
    if (existing) return existing;
    const createdAt = stamp();
    const entry: Entry = {
      conversation: { id: ++conversationSeq, threadId, title: deriveTitle(seedTitle), createdAt, updatedAt: createdAt },
      messages: [],
    };
    threads.set(threadId, entry);
    return entry;
  }

  const copy = <T extends object>(row: T): T => ({ ...row });

  return {
    kind: 'memory',

    async getOrCreateConversation(threadId, seedTitle) {
      const id = validate(ThreadIdSchema, threadId);
      const title = validate(SeedTitleSchema, seedTitle);
      return copy(resolve(id, title).conversation);
    },

    async addMessage(threadId, role, content, tokensUsed) {
      const input = validate(AddMessageSchema, { threadId, role, content, tokensUsed });
      const entry = resolve(input.threadId, input.role === 'user' ? input.content : undefined);
      const retitle = nextTitle(entry.conversation.title, input.role, input.content);
      if (retitle) entry.conversation.title = retitle;
      const createdAt = stamp();
      entry.conversation.updatedAt = createdAt;
      const message: Message = {
        id: ++messageSeq,
        conversationId: entry.conversation.id,
        role: input.role,
        content: input.content,
        createdAt,
        tokensUsed: input.tokensUsed ?? null,
      };
      entry.messages.push(message);
      return copy(message);
    },

    async listConversations(options = {}) {
      const { limit, offset } = validate(ListConversationsSchema, options);
      return [...threads.values()]
        .map((entry) => entry.conversation)
        .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime() || b.id - a.id)
        .slice(offset, offset + limit)
        .map(copy);
    },

    async getMessages(threadId, options = {}) {
      const input = validate(GetMessagesSchema, { threadId, limit: options.limit });
      const messages = threads.get(input.threadId)?.messages ?? [];
      const window = input.limit === undefined ? messages : messages.slice(-input.limit);
      return window.map(copy);
    },

    async deleteConversation(threadId) {
      return threads.delete(validate(ThreadIdSchema, threadId));
    },

    async getStats() {
      let totalMessages = 0;
      for (const entry of threads.values()) totalMessages += entry.messages.length;
      return { totalConversations: threads.size, totalMessages };
    },

    async healthCheck() {
      return true;
    },

    async close() {
      threads.clear();
    },
  };
}

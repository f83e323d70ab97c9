import type { DatabaseConfig } from '../config/database.js';
import type { DatabaseHandle } from '../db/client.js';
import type { Logger } from '../util/logging.js';
import type { Conversation, ConversationStats, Message, MessageRole } from './conversation.js';
import { createInMemoryStore } from './stores/inmemory.js';
import { createPostgresStore } from './stores/postgres.js';

export interface ConversationStore {
  readonly kind: 'postgres' | 'memory';
  getOrCreateConversation(threadId: string, seedTitle?: string): Promise<Conversation>;
  addMessage(threadId: string, role: MessageRole, content: string, tokensUsed?: number): Promise<Message>;
  listConversations(options?: { limit?: number; offset?: number }): Promise<Conversation[]>;
  /** Chronological; with a limit, the most recent `limit` messages. */
  getMessages(threadId: string, options?: { limit?: number }): Promise<Message[]>;
  deleteConversation(threadId: string): Promise<boolean>;
  getStats(): Promise<ConversationStats>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

export function createConversationStore(
  cfg: DatabaseConfig,
  deps: { database?: DatabaseHandle; log: Logger },
): ConversationStore {
  if (cfg.kind === 'postgres') {
    if (!deps.database) {
      deps.log.warn('postgres conversation store requested without a database handle, using memory store');
      return createInMemoryStore();
    }
    return createPostgresStore(deps.database, deps.log);
  }
  return createInMemoryStore();
}

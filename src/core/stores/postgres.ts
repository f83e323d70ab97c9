import { asc, count, desc, eq, getTableColumns, sql } from 'drizzle-orm';
import type { Database, DatabaseHandle } from '../../db/client.js';
import { conversations, messages } from '../../db/schema.js';
import type { Logger } from '../../util/logging.js';
import { errorMessage } from '../../util/logging.js';
import { incPersistenceFailure } from '../../util/metrics.js';
import type { ConversationStore } from '../conversation_store.js';
import {
  AddMessageSchema,
  GetMessagesSchema,
  ListConversationsSchema,
  SeedTitleSchema,
  ThreadIdSchema,
  deriveTitle,
  nextTitle,
  resolveWithRetry,
  validate,
  type Conversation,
} from '../conversation.js';
import { PersistenceError } from '../errors.js';

type Tx = Parameters<Parameters<Database['transaction']>[0]>[0];

/**
 * Conversation store on drizzle-orm over a pg pool. Every write runs in its
 * own transaction; concurrent creators of one thread are reconciled by the
 * unique constraint on thread_id.
 */
export function createPostgresStore(handle: DatabaseHandle, log: Logger): ConversationStore {
  const { db, pool } = handle;

  async function run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      incPersistenceFailure(operation);
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(operation, `${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async function resolveConversation(tx: Tx, threadId: string, seedTitle?: string): Promise<Conversation> {
    return resolveWithRetry(async () => {
      const [existing] = await tx.select().from(conversations).where(eq(conversations.threadId, threadId)).limit(1);
      if (existing) return existing;
      const [created] = await tx
        .insert(conversations)
        .values({ threadId, title: deriveTitle(seedTitle) })
        .onConflictDoNothing({ target: conversations.threadId })
        .returning();
      if (created) log.info({ threadId, conversationId: created.id }, 'conversation created');
      return created;
    });
  }

  return {
    kind: 'postgres',

    async getOrCreateConversation(threadId, seedTitle) {
      const id = validate(ThreadIdSchema, threadId);
      const title = validate(SeedTitleSchema, seedTitle);
      return run('get_or_create_conversation', () => db.transaction((tx) => resolveConversation(tx, id, title)));
    },

    async addMessage(threadId, role, content, tokensUsed) {
      const input = validate(AddMessageSchema, { threadId, role, content, tokensUsed });
      return run('add_message', () =>
        db.transaction(async (tx) => {
          const conversation = await resolveConversation(
            tx,
            input.threadId,
            input.role === 'user' ? input.content : undefined,
          );
          const retitle = nextTitle(conversation.title, input.role, input.content);
          // Row lock serializes writers of one thread until commit.
          await tx
            .update(conversations)
            .set({ updatedAt: sql`clock_timestamp()`, ...(retitle ? { title: retitle } : {}) })
            .where(eq(conversations.id, conversation.id));
          const [message] = await tx
            .insert(messages)
            .values({
              conversationId: conversation.id,
              role: input.role,
              content: input.content,
              tokensUsed: input.tokensUsed ?? null,
              createdAt: sql`GREATEST(clock_timestamp(), (SELECT max(m.created_at) + interval '1 microsecond' FROM messages m WHERE m.conversation_id = ${conversation.id}))`,
            })
            .returning();
          if (!message) throw new PersistenceError('add_message', 'insert returned no row');
          return message;
        }),
      );
    },

    async listConversations(options = {}) {
      const { limit, offset } = validate(ListConversationsSchema, options);
      return run('list_conversations', () =>
        db
          .select()
          .from(conversations)
          .orderBy(desc(conversations.updatedAt), desc(conversations.id))
          .limit(limit)
          .offset(offset),
      );
    },

    async getMessages(threadId, options = {}) {
      const input = validate(GetMessagesSchema, { threadId, limit: options.limit });
      return run('get_messages', async () => {
        const base = db
          .select(getTableColumns(messages))
          .from(messages)
          .innerJoin(conversations, eq(messages.conversationId, conversations.id))
          .where(eq(conversations.threadId, input.threadId));
        if (input.limit === undefined) {
          return base.orderBy(asc(messages.createdAt), asc(messages.id));
        }
        const recent = await base.orderBy(desc(messages.createdAt), desc(messages.id)).limit(input.limit);
        return recent.reverse();
      });
    },

    async deleteConversation(threadId) {
      const id = validate(ThreadIdSchema, threadId);
      return run('delete_conversation', async () => {
        const removed = await db
          .delete(conversations)
          .where(eq(conversations.threadId, id))
          .returning({ id: conversations.id });
        return removed.length > 0;
      });
    },

    async getStats() {
      return run('get_stats', async () => {
        const [conversationCount] = await db.select({ total: count() }).from(conversations);
        const [messageCount] = await db.select({ total: count() }).from(messages);
        return {
          totalConversations: conversationCount?.total ?? 0,
          totalMessages: messageCount?.total ?? 0,
        };
      });
    },

    async healthCheck() {
      try {
        await pool.query('SELECT 1');
        return true;
      } catch (err) {
        log.warn({ err }, 'postgres health check failed');
        return false;
      }
    },

    async close() {
      await pool.end();
    },
  };
}

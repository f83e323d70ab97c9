/**
 * Conversation history tables. sql/schema.sql creates the same structure
 * for deployments without a migration tool.
 */

import { check, index, integer, pgEnum, pgTable, serial, text, timestamp, unique, varchar } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

export const messageRole = pgEnum('message_role', ['user', 'assistant', 'system']);

export const conversations = pgTable(
  'conversations',
  {
    id: serial('id').primaryKey(),
    threadId: varchar('thread_id', { length: 100 }).notNull(),
    title: varchar('title', { length: 255 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    threadIdUnique: unique('conversations_thread_id_unique').on(table.threadId),
    updatedAtIdx: index('conversations_updated_at_idx').on(table.updatedAt),
  }),
);

export const messages = pgTable(
  'messages',
  {
    id: serial('id').primaryKey(),
    conversationId: integer('conversation_id')
      .references(() => conversations.id, { onDelete: 'cascade' })
      .notNull(),
    role: messageRole('role').notNull(),
    content: text('content').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .default(sql`clock_timestamp()`)
      .notNull(),
    tokensUsed: integer('tokens_used'),
  },
  (table) => ({
    conversationCreatedIdx: index('messages_conversation_created_idx').on(
      table.conversationId,
      table.createdAt,
      table.id,
    ),
    tokensNonNegative: check('messages_tokens_used_check', sql`${table.tokensUsed} IS NULL OR ${table.tokensUsed} >= 0`),
  }),
);

export type ConversationRow = typeof conversations.$inferSelect;
export type MessageRow = typeof messages.$inferSelect;

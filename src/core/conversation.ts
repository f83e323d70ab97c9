import { z } from 'zod';
import { ValidationError, PersistenceError } from './errors.js';

export const MESSAGE_ROLES = ['user', 'assistant', 'system'] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

export const PLACEHOLDER_TITLE = 'New conversation';
export const TITLE_MAX_CHARS = 100;
export const MAX_RESOLVE_ATTEMPTS = 3;

export interface Conversation {
  id: number;
  threadId: string;
  title: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Message {
  id: number;
  conversationId: number;
  role: MessageRole;
  content: string;
  createdAt: Date;
  tokensUsed: number | null;
}

export type ConversationStats = { totalConversations: number; totalMessages: number };

export const ThreadIdSchema = z
  .string({ invalid_type_error: 'threadId must be a string' })
  .min(1, 'threadId must not be empty')
  .max(100, 'threadId must be at most 100 characters')
  .refine((value) => value.trim().length > 0, 'threadId must not be blank');

// Postgres text columns cannot hold U+0000.
const textWithoutNul = (field: string) =>
  z
    .string({ invalid_type_error: `${field} must be a string`, required_error: `${field} is required` })
    .refine((value) => !value.includes('\u0000'), `${field} must not contain NUL characters`);

export const AddMessageSchema = z.object({
  threadId: ThreadIdSchema,
  role: z.enum(MESSAGE_ROLES, { errorMap: () => ({ message: `role must be one of ${MESSAGE_ROLES.join(', ')}` }) }),
  content: textWithoutNul('content'),
  tokensUsed: z.number().int('tokensUsed must be an integer').min(0, 'tokensUsed must not be negative').optional(),
});

export const ListConversationsSchema = z.object({
  limit: z.number().int().positive('limit must be positive').max(100).default(20),
  offset: z.number().int().min(0, 'offset must not be negative').default(0),
});

export const GetMessagesSchema = z.object({
  threadId: ThreadIdSchema,
  limit: z.number().int().positive('limit must be positive').max(1000).optional(),
});

export const SeedTitleSchema = textWithoutNul('seedTitle').optional();

/** Parses input or throws a ValidationError listing every issue. */
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new ValidationError(issues.join('; '), issues);
  }
  return parsed.data;
}

/**
 * Title for a new conversation: whitespace runs collapsed, cut to 100
 * code points, placeholder when nothing is left.
 */
export function deriveTitle(seed?: string | null): string {
  const collapsed = (seed ?? '').replace(/\s+/g, ' ').trim();
  return collapsed ? Array.from(collapsed).slice(0, TITLE_MAX_CHARS).join('') : PLACEHOLDER_TITLE;
}

/** A user message retitles a conversation that still has the placeholder. */
export function nextTitle(current: string, role: MessageRole, content: string): string | undefined {
  if (role !== 'user' || current !== PLACEHOLDER_TITLE) return undefined;
  const derived = deriveTitle(content);
  return derived === PLACEHOLDER_TITLE ? undefined : derived;
}

/**
 * Repeats `attempt` until it yields a value. `undefined` means a concurrent
 * writer won the insert and the row must be read again.
 */
export async function resolveWithRetry<T>(
  attempt: () => Promise<T | undefined>,
  maxAttempts = MAX_RESOLVE_ATTEMPTS,
): Promise<T> {
  for (let i = 0; i < maxAttempts; i++) {
    const value = await attempt();
    if (value !== undefined) return value;
  }
  throw new PersistenceError(
    'conversation_conflict',
    `conversation could not be resolved after ${maxAttempts} attempts`,
  );
}

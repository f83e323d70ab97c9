import { z } from 'zod';
import { ThreadIdSchema } from '../core/conversation.js';

export const ChatInput = z.object({
  message: z.string().trim().min(1).max(4000),
  threadId: ThreadIdSchema.optional(),
});
export type ChatInputT = z.infer<typeof ChatInput>;

export const ChatOutput = z.object({
  reply: z.string().min(1),
  threadId: z.string().min(1).max(100),
});
export type ChatOutputT = z.infer<typeof ChatOutput>;

export const PromptExecuteInput = z.object({
  promptName: z.string().min(1),
  arguments: z.record(z.string()).default({}),
  threadId: ThreadIdSchema.optional(),
});

export const ListConversationsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export const MessagesQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export const ClearCacheQuery = z.object({
  namespace: z.string().min(1).optional(),
});

import { randomUUID } from 'node:crypto';
import type { Response, Router } from 'express';
import express from 'express';
import { listPrompts, renderPrompt } from '../agent/prompts.js';
import type { AgentTurn } from '../agent/wiki_agent.js';
import type { Conversation, Message } from '../core/conversation.js';
import { AgentUnavailableError, toStdError } from '../core/errors.js';
import { validate } from '../core/conversation.js';
import type { Services } from '../core/runtime.js';
import {
  ChatInput,
  ChatOutput,
  ClearCacheQuery,
  ListConversationsQuery,
  MessagesQuery,
  PromptExecuteInput,
} from '../schemas/chat.js';
import { getPrometheusText, incChatTurn, incPersistenceFailure, metricsMode, snapshot } from '../util/metrics.js';

const conversationView = (c: Conversation) => ({
  threadId: c.threadId,
  title: c.title,
  createdAt: c.createdAt.toISOString(),
  updatedAt: c.updatedAt.toISOString(),
});

const messageView = (m: Message) => ({
  id: m.id,
  role: m.role,
  content: m.content,
  createdAt: m.createdAt.toISOString(),
  tokensUsed: m.tokensUsed,
});

export const router = (services: Services): Router => {
  const { log, cache, store } = services;
  const r = express.Router();

  function sendError(res: Response, err: unknown): void {
    const { status, body } = toStdError(err);
    if (status >= 500) log.error({ err }, 'request failed');
    res.status(status).json({ error: body });
  }

  /** Saves a chat turn; history is best-effort and never fails the reply. */
  async function recordTurn(threadId: string, message: string, reply: string, tokensUsed?: number): Promise<void> {
    try {
      await store.addMessage(threadId, 'user', message);
      await store.addMessage(threadId, 'assistant', reply, tokensUsed);
    } catch (err) {
      incPersistenceFailure('record_turn');
      log.warn({ err, threadId }, 'conversation history not saved');
    }
  }

  async function runChat(res: Response, message: string, threadId: string, persist: boolean) {
    const agent = services.agent;
    if (!agent) {
      incChatTurn('unavailable');
      throw new AgentUnavailableError();
    }
    let turn: AgentTurn;
    try {
      turn = await agent.runTurn(message, threadId);
    } catch (err) {
      incChatTurn('error');
      throw err;
    }
    incChatTurn('ok');
    if (persist) await recordTurn(threadId, message, turn.reply, turn.tokensUsed);
    res.json(ChatOutput.parse({ reply: turn.reply, threadId }));
  }

  r.get('/health', async (_req, res) => {
    const database = (await store.healthCheck()) ? 'ok' : 'degraded';
    res.json({
      status: 'healthy',
      model: services.agent?.model ?? 'unavailable',
      cache: cache.connected ? 'connected' : 'disconnected',
      database,
    });
  });

  r.post('/api/chat', async (req, res) => {
    try {
      const input = validate(ChatInput, req.body);
      await runChat(res, input.message, input.threadId ?? randomUUID(), true);
    } catch (err) {
      sendError(res, err);
    }
  });

  r.get('/api/cache/stats', async (_req, res) => {
    res.json(await cache.getStats());
  });

  r.delete('/api/cache', async (req, res) => {
    try {
      const { namespace } = validate(ClearCacheQuery, req.query);
      const cleared = await cache.clear(namespace);
      res.json({ cleared, message: `Cleared ${cleared} cached item${cleared === 1 ? '' : 's'}` });
    } catch (err) {
      sendError(res, err);
    }
  });

  r.get('/api/db/stats', async (_req, res) => {
    try {
      const stats = await store.getStats();
      res.json({ status: 'connected', store: store.kind, ...stats });
    } catch (err) {
      log.warn({ err }, 'conversation stats unavailable');
      res.json({ status: 'disconnected', store: store.kind, error: toStdError(err).body.message });
    }
  });

  r.get('/api/conversations', async (req, res) => {
    try {
      const { limit, offset } = validate(ListConversationsQuery, req.query);
      const conversations = await store.listConversations({ limit, offset });
      res.json({ conversations: conversations.map(conversationView) });
    } catch (err) {
      sendError(res, err);
    }
  });

  r.get('/api/conversations/:threadId/messages', async (req, res) => {
    try {
      const { limit } = validate(MessagesQuery, req.query);
      const messages = await store.getMessages(req.params.threadId, { limit });
      res.json({ threadId: req.params.threadId, messages: messages.map(messageView) });
    } catch (err) {
      sendError(res, err);
    }
  });

  r.delete('/api/conversations/:threadId', async (req, res) => {
    try {
      const deleted = await store.deleteConversation(req.params.threadId);
      services.memory?.clear(req.params.threadId);
      res.status(deleted ? 200 : 404).json({ deleted });
    } catch (err) {
      sendError(res, err);
    }
  });

  r.get('/api/prompts', (_req, res) => {
    res.json({ prompts: listPrompts() });
  });

  r.post('/api/prompts/execute', async (req, res) => {
    try {
      const input = validate(PromptExecuteInput, req.body);
      const message = await renderPrompt(input.promptName, input.arguments);
      await runChat(res, message, input.threadId ?? randomUUID(), false);
    } catch (err) {
      sendError(res, err);
    }
  });

  r.get('/metrics', async (_req, res) => {
    if (metricsMode === 'prom') {
      res.setHeader('Content-Type', 'text/plain; version=0.0.4');
      res.send(await getPrometheusText());
      return;
    }
    res.json(await snapshot());
  });

  return r;
};

import request from 'supertest';
import { PersistenceError } from '../../../src/core/errors.js';
import { LlmError } from '../../../src/core/llm.js';
import { createInMemoryStore } from '../../../src/core/stores/inmemory.js';
import { echoAgent, makeTestApp } from '../../helpers/http.js';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe('HTTP API', () => {
  describe('GET /health', () => {
    it('reports model, cache and database state', async () => {
      const { app } = makeTestApp();
      const res = await request(app).get('/health');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'healthy', model: 'test-model', cache: 'connected', database: 'ok' });
    });

    it('stays healthy with degraded dependencies', async () => {
      const store = { ...createInMemoryStore(), healthCheck: async () => false };
      const { app, services } = makeTestApp({ agent: null, store });
      services.kv.ready = false;

      const res = await request(app).get('/health');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'healthy', model: 'unavailable', cache: 'disconnected', database: 'degraded' });
    });
  });

  describe('POST /api/chat', () => {
    it('replies and records both turns', async () => {
      const { app, services } = makeTestApp();
      const res = await request(app).post('/api/chat').send({ message: '  Who was Ada Lovelace?  ', threadId: 't1' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ reply: 'echo: Who was Ada Lovelace?', threadId: 't1' });
      const messages = await services.store.getMessages('t1');
      expect(messages.map((m) => [m.role, m.content, m.tokensUsed])).toEqual([
        ['user', 'Who was Ada Lovelace?', null],
        ['assistant', 'echo: Who was Ada Lovelace?', 12],
      ]);
      const [conversation] = await services.store.listConversations();
      expect(conversation?.title).toBe('Who was Ada Lovelace?');
    });

    it('starts a new thread when none is given', async () => {
      const { app } = makeTestApp();
      const res = await request(app).post('/api/chat').send({ message: 'hello' });
      expect(res.status).toBe(200);
      expect(res.body.threadId).toMatch(UUID);
    });

    it('rejects a blank message', async () => {
      const agent = echoAgent();
      const { app } = makeTestApp({ agent });
      const res = await request(app).post('/api/chat').send({ message: '   ' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('invalid_request');
      expect(res.body.error.details).toEqual(['message: String must contain at least 1 character(s)']);
      expect(agent.calls).toEqual([]);
    });

    it('rejects a thread id longer than 100 characters', async () => {
      const { app } = makeTestApp();
      const res = await request(app)
        .post('/api/chat')
        .send({ message: 'hi', threadId: 'x'.repeat(101) });
      expect(res.status).toBe(400);
      expect(res.body.error.details).toEqual(['threadId: threadId must be at most 100 characters']);
    });

    it('answers 503 without a configured agent', async () => {
      const { app } = makeTestApp({ agent: null });
      const res = await request(app).post('/api/chat').send({ message: 'hi' });
      expect(res.status).toBe(503);
      expect(res.body).toEqual({ error: { code: 'agent_unavailable', message: 'Chat agent is not configured' } });
    });

    it('maps model failures to upstream errors', async () => {
      const failing = {
        model: 'test-model',
        runTurn: async (): Promise<never> => {
          throw new LlmError('timeout', 'LLM request timed out after 30000ms');
        },
      };
      const { app } = makeTestApp({ agent: failing });
      const res = await request(app).post('/api/chat').send({ message: 'hi' });
      expect(res.status).toBe(504);
      expect(res.body.error.code).toBe('upstream_timeout');
    });

    it('still replies when history cannot be saved', async () => {
      const store = {
        ...createInMemoryStore(),
        addMessage: async (): Promise<never> => {
          throw new PersistenceError('add_message', 'connection refused');
        },
      };
      const { app } = makeTestApp({ store });
      const res = await request(app).post('/api/chat').send({ message: 'hi', threadId: 't1' });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ reply: 'echo: hi', threadId: 't1' });
    });

    it('answers 400 for a body that is not JSON', async () => {
      const { app } = makeTestApp();
      const res = await request(app).post('/api/chat').set('Content-Type', 'application/json').send('{"message":');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: { code: 'invalid_request', message: 'Request body is not valid JSON' } });
    });
  });

  describe('conversations', () => {
    async function seeded() {
      const ctx = makeTestApp();
      await request(ctx.app).post('/api/chat').send({ message: 'first question', threadId: 'a' });
      await request(ctx.app).post('/api/chat').send({ message: 'second question', threadId: 'b' });
      await request(ctx.app).post('/api/chat').send({ message: 'follow-up', threadId: 'a' });
      return ctx;
    }

    it('lists the most recently updated first', async () => {
      const { app } = await seeded();
      const res = await request(app).get('/api/conversations');

      expect(res.status).toBe(200);
      expect(res.body.conversations.map((c: { threadId: string }) => c.threadId)).toEqual(['a', 'b']);
      expect(res.body.conversations[0]).toMatchObject({ threadId: 'a', title: 'first question' });
      expect(new Date(res.body.conversations[0].updatedAt).toISOString()).toBe(res.body.conversations[0].updatedAt);
    });

    it('pages with limit and offset', async () => {
      const { app } = await seeded();
      const res = await request(app).get('/api/conversations?limit=1&offset=1');
      expect(res.body.conversations.map((c: { threadId: string }) => c.threadId)).toEqual(['b']);
    });

    it('rejects an invalid limit', async () => {
      const { app } = makeTestApp();
      const res = await request(app).get('/api/conversations?limit=0');
      expect(res.status).toBe(400);
    });

    it('returns messages chronologically, or the most recent ones', async () => {
      const { app } = await seeded();
      const all = await request(app).get('/api/conversations/a/messages');
      expect(all.body.threadId).toBe('a');
      expect(all.body.messages.map((m: { content: string }) => m.content)).toEqual([
        'first question',
        'echo: first question',
        'follow-up',
        'echo: follow-up',
      ]);

      const recent = await request(app).get('/api/conversations/a/messages?limit=1');
      expect(recent.body.messages).toHaveLength(1);
      expect(recent.body.messages[0]).toMatchObject({ role: 'assistant', content: 'echo: follow-up', tokensUsed: 12 });
    });

    it('returns an empty list for an unknown thread', async () => {
      const { app } = makeTestApp();
      const res = await request(app).get('/api/conversations/nobody/messages');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ threadId: 'nobody', messages: [] });
    });

    it('deletes a conversation once', async () => {
      const { app } = await seeded();
      const first = await request(app).delete('/api/conversations/a');
      expect(first.status).toBe(200);
      expect(first.body).toEqual({ deleted: true });

      const again = await request(app).delete('/api/conversations/a');
      expect(again.status).toBe(404);
      expect(again.body).toEqual({ deleted: false });
    });

    it('reports store statistics', async () => {
      const { app } = await seeded();
      const res = await request(app).get('/api/db/stats');
      expect(res.body).toEqual({ status: 'connected', store: 'memory', totalConversations: 2, totalMessages: 6 });
    });

    it('reports an unavailable store without failing', async () => {
      const store = {
        ...createInMemoryStore(),
        getStats: async (): Promise<never> => {
          throw new PersistenceError('get_stats', 'connection refused');
        },
      };
      const { app } = makeTestApp({ store });
      const res = await request(app).get('/api/db/stats');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'disconnected', store: 'memory', error: 'Conversation storage is unavailable' });
    });
  });

  describe('cache endpoints', () => {
    it('reports cache statistics', async () => {
      const { app, services } = makeTestApp();
      services.kv.plant('wiki:search:aaaaaaaaaaaa', '{"ok":true,"data":{}}');
      services.kv.plant('wiki:section:bbbbbbbbbbbb', '{"ok":true,"data":{}}');

      const res = await request(app).get('/api/cache/stats');
      expect(res.body).toEqual({
        status: 'connected',
        target: 'localhost:6379/0',
        itemCount: 2,
        namespaces: { search: 1, section: 1 },
        hits: 0,
        misses: 0,
        memoryUsed: '1.00M',
        ttlSeconds: 3600,
      });
    });

    it('clears one namespace or everything', async () => {
      const { app, services } = makeTestApp();
      services.kv.plant('wiki:search:aaaaaaaaaaaa', '{}');
      services.kv.plant('wiki:search:cccccccccccc', '{}');
      services.kv.plant('wiki:section:bbbbbbbbbbbb', '{}');

      const one = await request(app).delete('/api/cache?namespace=search');
      expect(one.body).toEqual({ cleared: 2, message: 'Cleared 2 cached items' });
      expect(services.kv.liveKeys()).toEqual(['wiki:section:bbbbbbbbbbbb']);

      const rest = await request(app).delete('/api/cache');
      expect(rest.body).toEqual({ cleared: 1, message: 'Cleared 1 cached item' });
    });

    it('rejects a malformed namespace', async () => {
      const { app } = makeTestApp();
      const res = await request(app).delete('/api/cache?namespace=a*b');
      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('invalid_request');
    });
  });

  describe('prompts', () => {
    it('lists the catalog', async () => {
      const { app } = makeTestApp();
      const res = await request(app).get('/api/prompts');
      expect(res.body.prompts.map((p: { name: string }) => p.name)).toEqual([
        'highlight_sections_prompt',
        'summarize_topic',
        'compare_topics',
        'deep_dive',
      ]);
    });

    it('runs a rendered prompt without recording history', async () => {
      const agent = echoAgent();
      const { app, services } = makeTestApp({ agent });
      const res = await request(app)
        .post('/api/prompts/execute')
        .send({ promptName: 'summarize_topic', arguments: { topic: 'Photosynthesis' }, threadId: 'p1' });

      expect(res.status).toBe(200);
      expect(res.body.threadId).toBe('p1');
      expect(agent.calls[0]?.message).toContain('Photosynthesis');
      expect(await services.store.listConversations()).toEqual([]);
    });

    it('rejects unknown prompts and missing arguments', async () => {
      const { app } = makeTestApp();
      const unknown = await request(app).post('/api/prompts/execute').send({ promptName: 'nope' });
      expect(unknown.status).toBe(400);
      expect(unknown.body.error.message).toBe('Unknown prompt: nope');

      const missing = await request(app)
        .post('/api/prompts/execute')
        .send({ promptName: 'compare_topics', arguments: { topic1: 'Rome' } });
      expect(missing.status).toBe(400);
      expect(missing.body.error.message).toBe('Missing prompt arguments: topic2');
    });
  });

  it('serves metrics as JSON', async () => {
    const { app } = makeTestApp();
    await request(app).post('/api/chat').send({ message: 'hi' });
    const res = await request(app).get('/metrics');
    expect(res.status).toBe(200);
    expect(res.body.counters['chat_turns_total{outcome=ok}']).toBeGreaterThanOrEqual(1);
  });

  it('answers CORS preflight', async () => {
    const { app } = makeTestApp();
    const res = await request(app).options('/api/chat');
    expect(res.status).toBe(200);
    expect(res.headers['access-control-allow-origin']).toBe('*');
    expect(res.headers['access-control-allow-methods']).toBe('GET, POST, DELETE, OPTIONS');
  });
});

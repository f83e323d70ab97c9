import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from 'undici';
import { loadLlmConfig } from '../../../src/config/llm.js';
import { createLlmClient, LlmError } from '../../../src/core/llm.js';
import { silentLogger } from '../../helpers/logger.js';

const BASE = 'https://llm.example.test';

describe('LLM client', () => {
  let agent: MockAgent;
  let previous: Dispatcher;

  beforeEach(() => {
    previous = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
  });

  afterEach(async () => {
    setGlobalDispatcher(previous);
    await agent.close();
  });

  const client = () =>
    createLlmClient(
      { ...loadLlmConfig({ LLM_PROVIDER: 'custom', LLM_MODEL: 'test-model', LLM_API_KEY: 'test-secret' }), baseUrl: `${BASE}/v1` },
      silentLogger,
    );

  it('posts the conversation and maps tool calls', async () => {
    let sent: unknown;
    agent
      .get(BASE)
      .intercept({
        path: '/v1/chat/completions',
        method: 'POST',
        headers: { authorization: 'Bearer test-secret' },
        body: (body) => {
          sent = JSON.parse(body);
          return true;
        },
      })
      .reply(200, {
        choices: [
          {
            message: {
              content: null,
              tool_calls: [{ id: 'c1', type: 'function', function: { name: 'fetch_wikipedia_info', arguments: '{"query":"Rome"}' } }],
            },
            finish_reason: 'tool_calls',
          },
        ],
        usage: { total_tokens: 42 },
      });

    const completion = await client().chat({
      messages: [{ role: 'user', content: 'What is Rome?' }],
      tools: [{ type: 'function', function: { name: 'fetch_wikipedia_info', parameters: { type: 'object' } } }],
    });

    expect(completion).toEqual({
      message: {
        content: null,
        toolCalls: [{ id: 'c1', type: 'function', function: { name: 'fetch_wikipedia_info', arguments: '{"query":"Rome"}' } }],
      },
      totalTokens: 42,
    });
    expect(sent).toMatchObject({ model: 'test-model', temperature: 0, tool_choice: 'auto' });
  });

  it('omits tools when none are offered', async () => {
    let sent: Record<string, unknown> = {};
    agent
      .get(BASE)
      .intercept({
        path: '/v1/chat/completions',
        method: 'POST',
        body: (body) => {
          sent = JSON.parse(body);
          return true;
        },
      })
      .reply(200, { choices: [{ message: { content: 'Hi.' } }] });

    const completion = await client().chat({ messages: [{ role: 'user', content: 'hi' }], tools: [] });
    expect(completion).toEqual({ message: { content: 'Hi.', toolCalls: [] }, totalTokens: undefined });
    expect(sent).not.toHaveProperty('tools');
  });

  it('raises an http error for non-OK responses', async () => {
    agent.get(BASE).intercept({ path: '/v1/chat/completions', method: 'POST' }).reply(401, { error: 'bad key' });
    await expect(client().chat({ messages: [{ role: 'user', content: 'hi' }], tools: [] })).rejects.toMatchObject({
      kind: 'http',
      status: 401,
      message: 'HTTP_401',
    });
  });

  it('rejects a response of the wrong shape', async () => {
    agent.get(BASE).intercept({ path: '/v1/chat/completions', method: 'POST' }).reply(200, { choices: [] });
    const err = await client()
      .chat({ messages: [{ role: 'user', content: 'hi' }], tools: [] })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LlmError);
    expect(err).toHaveProperty('kind', 'invalid_response');
  });
});

import { fetch as undiciFetch } from 'undici';
import { z } from 'zod';
import type { LlmConfig } from '../config/llm.js';
import { withBreaker } from '../util/circuit.js';
import type { Logger } from '../util/logging.js';
import { observeLlmRequest } from '../util/metrics.js';

export type ToolCall = { id: string; type: 'function'; function: { name: string; arguments: string } };

export type ChatMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: ToolCall[] }
  | { role: 'tool'; content: string; tool_call_id: string };

export type FunctionToolSpec = {
  type: 'function';
  function: { name: string; description?: string; parameters: Record<string, unknown> };
};

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').default('function'),
  function: z.object({ name: z.string(), arguments: z.string().default('{}') }),
});

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().default(null),
          tool_calls: z.array(ToolCallSchema).optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
  usage: z.object({ total_tokens: z.number().int().nonnegative() }).partial().optional(),
});

export type ChatCompletion = {
  message: { content: string | null; toolCalls: ToolCall[] };
  totalTokens?: number;
};

export interface LlmClient {
  readonly model: string;
  chat(req: { messages: ChatMessage[]; tools: FunctionToolSpec[]; signal?: AbortSignal }): Promise<ChatCompletion>;
}

export class LlmError extends Error {
  constructor(
    readonly kind: 'http' | 'timeout' | 'network' | 'invalid_response',
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'LlmError';
  }
}

/**
 * OpenAI-compatible /chat/completions client with function calling.
 */
export function createLlmClient(cfg: LlmConfig & { baseUrl: string }, log: Logger): LlmClient {
  const url = `${cfg.baseUrl}/chat/completions`;
  const host = new URL(cfg.baseUrl).host;

  async function post(body: string, signal: AbortSignal): Promise<unknown> {
    const res = await undiciFetch(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        ...(cfg.apiKey ? { authorization: `Bearer ${cfg.apiKey}` } : {}),
      },
      body,
      signal,
    });
    if (!res.ok) {
      const errorText = await res.text().catch(() => '');
      log.warn({ status: res.status, body: errorText.slice(0, 500) }, '🔧 LLM: non-OK response');
      throw new LlmError('http', `HTTP_${res.status}`, res.status);
    }
    return res.json();
  }

  return {
    model: cfg.model,

    async chat({ messages, tools, signal }) {
      const timeout = AbortSignal.timeout(cfg.timeoutMs);
      const combined = signal ? AbortSignal.any([timeout, signal]) : timeout;
      const body = JSON.stringify({
        model: cfg.model,
        messages,
        temperature: cfg.temperature,
        ...(tools.length ? { tools, tool_choice: 'auto' } : {}),
      });
      log.debug({ model: cfg.model, messages: messages.length, tools: tools.length }, '🔧 LLM: request');

      const start = Date.now();
      let raw: unknown;
      try {
        raw = await withBreaker(host, () => post(body, combined));
      } catch (err) {
        const failure =
          err instanceof LlmError
            ? err
            : timeout.aborted
              ? new LlmError('timeout', `LLM request timed out after ${cfg.timeoutMs}ms`)
              : new LlmError('network', err instanceof Error ? err.message : String(err));
        observeLlmRequest(cfg.provider, failure.kind, Date.now() - start);
        throw failure;
      }

      const parsed = CompletionSchema.safeParse(raw);
      if (!parsed.success) {
        observeLlmRequest(cfg.provider, 'invalid_response', Date.now() - start);
        throw new LlmError('invalid_response', 'completion response did not match the expected shape');
      }
      observeLlmRequest(cfg.provider, 'ok', Date.now() - start);
      const [choice] = parsed.data.choices;
      return {
        message: { content: choice.message.content, toolCalls: choice.message.tool_calls ?? [] },
        totalTokens: parsed.data.usage?.total_tokens,
      };
    },
  };
}

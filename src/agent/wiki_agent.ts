import type { ChatMessage, LlmClient } from '../core/llm.js';
import { LlmError } from '../core/llm.js';
import type { Logger } from '../util/logging.js';
import type { ThreadMemory } from './memory.js';
import { executeToolCall, type ToolSpec } from './tools.js';

export type AgentTurn = { reply: string; toolCalls: number; tokensUsed?: number };

export interface ChatAgent {
  readonly model: string;
  runTurn(message: string, threadId: string, opts?: { signal?: AbortSignal }): Promise<AgentTurn>;
}

const FINAL_ANSWER_NUDGE = 'Tool budget exhausted. Answer the user now using the tool results above.';

/**
 * Tool-calling loop: the model may request tools for up to `maxSteps`
 * rounds; after that it gets one last call without tools.
 */
export function createWikiAgent(deps: {
  llm: LlmClient;
  tools: ToolSpec[];
  memory: ThreadMemory;
  systemPrompt: string;
  maxSteps: number;
  log: Logger;
}): ChatAgent {
  const { llm, tools, memory, log } = deps;
  const specs = tools.map((t) => t.spec);

  return {
    model: llm.model,

    async runTurn(message, threadId, opts = {}) {
      const messages: ChatMessage[] = [
        { role: 'system', content: deps.systemPrompt },
        ...memory.get(threadId),
        { role: 'user', content: message },
      ];
      let tokens = 0;
      let toolCalls = 0;
      let reply: string | undefined;

      for (let step = 0; step < deps.maxSteps && reply === undefined; step++) {
        const completion = await llm.chat({ messages, tools: specs, signal: opts.signal });
        tokens += completion.totalTokens ?? 0;
        const { content, toolCalls: calls } = completion.message;
        if (calls.length === 0) {
          reply = content ?? '';
          break;
        }
        messages.push({ role: 'assistant', content, tool_calls: calls });
        for (const call of calls) {
          const result = await executeToolCall(tools, call, log);
          toolCalls++;
          messages.push({ role: 'tool', tool_call_id: call.id, content: JSON.stringify(result) });
        }
      }

      if (reply === undefined) {
        log.debug({ threadId, maxSteps: deps.maxSteps }, 'agent step budget exhausted');
        messages.push({ role: 'system', content: FINAL_ANSWER_NUDGE });
        const final = await llm.chat({ messages, tools: [], signal: opts.signal });
        tokens += final.totalTokens ?? 0;
        reply = final.message.content ?? '';
      }

      const text = reply.trim();
      if (!text) throw new LlmError('invalid_response', 'model returned an empty reply');
      memory.append(threadId, { role: 'user', content: message }, { role: 'assistant', content: text });
      log.info({ threadId, toolCalls, tokens }, 'agent turn complete');
      return { reply: text, toolCalls, tokensUsed: tokens > 0 ? tokens : undefined };
    },
  };
}

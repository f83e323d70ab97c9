import { z } from 'zod';
import { retry, handleAll, ExponentialBackoff } from 'cockatiel';
import type { FunctionToolSpec, ToolCall } from '../core/llm.js';
import { failure, type ToolResult } from '../core/result.js';
import type { Logger } from '../util/logging.js';
import type { WikipediaTools } from '../tools/wikipedia.js';

export type ToolSpec = {
  name: string;
  description: string;
  // OpenAI-style tool spec sent to the model
  spec: FunctionToolSpec;
  call: (args: unknown) => Promise<ToolResult<unknown>>;
};

// Retries thrown errors only; a { ok: false } result is an answer, not a fault.
const policy = retry(handleAll, {
  maxAttempts: 2,
  backoff: new ExponentialBackoff({ initialDelay: 200, maxDelay: 2000 }),
});

// Minimal JSON Schema builders for the tool inputs
const str = (description: string) => ({ type: 'string', description });
const obj = (properties: Record<string, unknown>, required: string[]) => ({
  type: 'object',
  properties,
  required,
  additionalProperties: false,
});

function defineTool<S extends z.ZodTypeAny>(def: {
  name: string;
  description: string;
  schema: S;
  parameters: Record<string, unknown>;
  run: (input: z.output<S>) => Promise<ToolResult<unknown>>;
}): ToolSpec {
  return {
    name: def.name,
    description: def.description,
    spec: { type: 'function', function: { name: def.name, description: def.description, parameters: def.parameters } },
    async call(args: unknown) {
      const input = def.schema.safeParse(args);
      if (!input.success) {
        return failure(`invalid_arguments: ${input.error.issues.map((i) => i.message).join('; ')}`);
      }
      return def.run(input.data);
    },
  };
}

export function createAgentTools(wiki: WikipediaTools): ToolSpec[] {
  return [
    defineTool({
      name: 'fetch_wikipedia_info',
      description: 'Search Wikipedia for a topic and return the title, summary and URL of the best match.',
      schema: z.object({ query: z.string().min(1) }),
      parameters: obj({ query: str('Topic or question to look up') }, ['query']),
      run: ({ query }) => wiki.fetchWikipediaInfo(query),
    }),
    defineTool({
      name: 'list_wikipedia_sections',
      description: 'List the section titles of the Wikipedia article on a topic.',
      schema: z.object({ topic: z.string().min(1) }),
      parameters: obj({ topic: str('Exact article title') }, ['topic']),
      run: ({ topic }) => wiki.listWikipediaSections(topic),
    }),
    defineTool({
      name: 'get_section_content',
      description: 'Return the text of one section of a Wikipedia article.',
      schema: z.object({ topic: z.string().min(1), section_title: z.string().min(1) }),
      parameters: obj({ topic: str('Exact article title'), section_title: str('Section heading') }, [
        'topic',
        'section_title',
      ]),
      run: ({ topic, section_title }) => wiki.getSectionContent(topic, section_title),
    }),
  ];
}

function parseArguments(raw: string): unknown {
  try {
    return raw.trim() ? JSON.parse(raw) : {};
  } catch {
    return undefined;
  }
}

/**
 * Runs one model-requested tool call. Unknown tools, malformed arguments and
 * errors that survive the retry policy come back as failures so the model
 * can recover.
 */
export async function executeToolCall(tools: ToolSpec[], call: ToolCall, log: Logger): Promise<ToolResult<unknown>> {
  const tool = tools.find((t) => t.name === call.function.name);
  if (!tool) return failure(`unknown_tool: ${call.function.name}`);
  const args = parseArguments(call.function.arguments);
  if (args === undefined) return failure('invalid_arguments: arguments are not valid JSON');
  const start = Date.now();
  try {
    const result = await policy.execute(() => tool.call(args));
    log.debug({ tool: tool.name, ok: result.ok, cached: result.ok && result.cached === true, ms: Date.now() - start }, '🔧 tool call');
    return result;
  } catch (err) {
    log.warn({ err, tool: tool.name }, 'tool call failed');
    return failure(`tool_error: ${err instanceof Error ? err.message : String(err)}`);
  }
}

import { loadCacheConfig, type CacheConfig } from '../config/cache.js';
import { loadDatabaseConfig } from '../config/database.js';
import { isLlmConfigured, loadLlmConfig } from '../config/llm.js';
import { loadWikipediaConfig } from '../config/wikipedia.js';
import { createDatabase, initDatabase, type DatabaseHandle } from '../db/client.js';
import { createThreadMemory, type ThreadMemory } from '../agent/memory.js';
import { loadSystemPrompt } from '../agent/prompts.js';
import { createAgentTools } from '../agent/tools.js';
import { createWikiAgent, type ChatAgent } from '../agent/wiki_agent.js';
import { createWikipediaTools, type WikipediaTools } from '../tools/wikipedia.js';
import { createLogger, type Logger } from '../util/logging.js';
import { CacheLayer } from './cache.js';
import { createConversationStore, type ConversationStore } from './conversation_store.js';
import { createLlmClient } from './llm.js';
import { connectKeyValueStore } from './stores/redis.js';

/** Everything the HTTP app and the CLI need. */
export interface Services {
  log: Logger;
  cache: CacheLayer;
  store: ConversationStore;
  agent?: ChatAgent;
  memory?: ThreadMemory;
}

export interface Runtime extends Services {
  cacheConfig: CacheConfig;
  wikipedia: WikipediaTools;
  close(): Promise<void>;
}

async function openDatabase(env: NodeJS.ProcessEnv, log: Logger): Promise<DatabaseHandle | undefined> {
  const cfg = loadDatabaseConfig(env);
  if (cfg.kind !== 'postgres') return undefined;
  const handle = createDatabase(cfg, log.child({ component: 'db' }));
  try {
    await initDatabase(handle, log);
  } catch (err) {
    // Writes are retried per call, so the store recovers once Postgres is up.
    log.warn({ err }, 'conversation schema could not be initialized; history may be unavailable');
  }
  return handle;
}

/**
 * Builds the process-scoped clients once. `close()` releases them in reverse
 * order and logs, rather than throws, individual failures.
 */
export async function createRuntime(opts: { env?: NodeJS.ProcessEnv; log?: Logger } = {}): Promise<Runtime> {
  const env = opts.env ?? process.env;
  const log = opts.log ?? createLogger();

  const cacheConfig = loadCacheConfig(env);
  const kv = await connectKeyValueStore(cacheConfig, log.child({ component: 'cache' }));
  const cache = new CacheLayer(kv, cacheConfig, log.child({ component: 'cache' }));

  const database = await openDatabase(env, log);
  const store = createConversationStore(loadDatabaseConfig(env), { database, log: log.child({ component: 'store' }) });

  const wikipedia = createWikipediaTools(cache, cacheConfig, loadWikipediaConfig(env));

  const llmConfig = loadLlmConfig(env);
  let agent: ChatAgent | undefined;
  let memory: ThreadMemory | undefined;
  if (isLlmConfigured(llmConfig)) {
    memory = createThreadMemory({ ttlSec: llmConfig.memoryTtlSec, maxMessages: llmConfig.memoryMessages });
    agent = createWikiAgent({
      llm: createLlmClient(llmConfig, log.child({ component: 'llm' })),
      tools: createAgentTools(wikipedia),
      memory,
      systemPrompt: await loadSystemPrompt(),
      maxSteps: llmConfig.maxSteps,
      log: log.child({ component: 'agent' }),
    });
    log.info({ provider: llmConfig.provider, model: llmConfig.model }, '🤖 chat agent ready');
  } else {
    log.warn({ provider: llmConfig.provider }, 'LLM provider not configured; chat is disabled');
  }

  return {
    log,
    cache,
    cacheConfig,
    store,
    agent,
    memory,
    wikipedia,
    async close() {
      memory?.close();
      try {
        await store.close();
      } catch (err) {
        log.warn({ err }, 'conversation store close failed');
      }
      await cache.close();
    },
  };
}

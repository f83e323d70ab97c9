import { z } from 'zod';
import { envValue } from './env.js';

export const LLM_PROVIDERS = ['openai', 'groq', 'google', 'ollama', 'custom'] as const;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

type Preset = { baseUrl?: string; model: string; keyEnv?: string; modelEnv?: string };

const PRESETS: Record<LlmProvider, Preset> = {
  openai: { baseUrl: 'https://api.openai.com/v1', model: 'gpt-4o-mini', keyEnv: 'OPENAI_API_KEY', modelEnv: 'OPENAI_MODEL' },
  groq: {
    baseUrl: 'https://api.groq.com/openai/v1',
    model: 'llama-3.3-70b-versatile',
    keyEnv: 'GROQ_API_KEY',
    modelEnv: 'GROQ_MODEL',
  },
  google: {
    baseUrl: 'https://generativelanguage.googleapis.com/v1beta/openai',
    model: 'gemini-1.5-flash',
    keyEnv: 'GOOGLE_API_KEY',
    modelEnv: 'GOOGLE_MODEL',
  },
  ollama: { model: 'llama3.2', modelEnv: 'OLLAMA_MODEL' },
  custom: { model: 'default' },
};

const LlmEnvSchema = z.object({
  provider: z.enum(LLM_PROVIDERS).default('groq'),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().optional(),
  model: z.string().min(1).optional(),
  temperature: z.coerce.number().min(0).max(2).default(0),
  timeoutMs: z.coerce.number().int().min(1000).default(30000),
  maxSteps: z.coerce.number().int().min(1).max(12).default(5),
  memoryMessages: z.coerce.number().int().min(0).max(200).default(20),
  memoryTtlSec: z.coerce.number().int().min(60).default(3600),
});

export type LlmConfig = {
  provider: LlmProvider;
  baseUrl?: string;
  apiKey?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  maxSteps: number;
  memoryMessages: number;
  memoryTtlSec: number;
};

/**
 * Resolves provider presets. LLM_* variables win over provider-specific ones
 * such as GROQ_API_KEY; Ollama defaults to OLLAMA_BASE_URL/v1.
 */
export function loadLlmConfig(env: NodeJS.ProcessEnv = process.env): LlmConfig {
  const parsed = LlmEnvSchema.parse({
    provider: envValue(env.LLM_PROVIDER)?.toLowerCase(),
    baseUrl: envValue(env.LLM_PROVIDER_BASEURL),
    apiKey: envValue(env.LLM_API_KEY),
    model: envValue(env.LLM_MODEL),
    temperature: envValue(env.LLM_TEMPERATURE),
    timeoutMs: envValue(env.LLM_TIMEOUT_MS),
    maxSteps: envValue(env.AGENT_MAX_STEPS),
    memoryMessages: envValue(env.AGENT_MEMORY_MESSAGES),
    memoryTtlSec: envValue(env.AGENT_MEMORY_TTL_SEC),
  });
  const preset = PRESETS[parsed.provider];
  const ollamaBase = `${(envValue(env.OLLAMA_BASE_URL) ?? 'http://localhost:11434').replace(/\/+$/, '')}/v1`;
  const presetBase = parsed.provider === 'ollama' ? ollamaBase : preset.baseUrl;
  return {
    provider: parsed.provider,
    baseUrl: (parsed.baseUrl ?? presetBase)?.replace(/\/+$/, ''),
    apiKey: parsed.apiKey ?? (preset.keyEnv ? envValue(env[preset.keyEnv]) : undefined),
    model: parsed.model ?? (preset.modelEnv ? envValue(env[preset.modelEnv]) : undefined) ?? preset.model,
    temperature: parsed.temperature,
    timeoutMs: parsed.timeoutMs,
    maxSteps: parsed.maxSteps,
    memoryMessages: parsed.memoryMessages,
    memoryTtlSec: parsed.memoryTtlSec,
  };
}

/** Hosted providers need a key; Ollama and custom endpoints may run without one. */
export function isLlmConfigured(cfg: LlmConfig): cfg is LlmConfig & { baseUrl: string } {
  if (!cfg.baseUrl) return false;
  return cfg.provider === 'ollama' || cfg.provider === 'custom' || Boolean(cfg.apiKey);
}

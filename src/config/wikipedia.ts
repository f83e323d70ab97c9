import { z } from 'zod';
import { envValue } from './env.js';

export const WikipediaConfigSchema = z.object({
  lang: z
    .string()
    .regex(/^[a-z][a-z-]{1,11}$/, 'WIKIPEDIA_LANG must be a language subdomain such as "en"')
    .default('en'),
  timeoutMs: z.coerce.number().int().min(100).default(4000),
  retries: z.coerce.number().int().min(0).max(5).default(1),
});

export type WikipediaConfig = z.infer<typeof WikipediaConfigSchema>;

export function loadWikipediaConfig(env: NodeJS.ProcessEnv = process.env): WikipediaConfig {
  return WikipediaConfigSchema.parse({
    lang: envValue(env.WIKIPEDIA_LANG),
    timeoutMs: envValue(env.WIKIPEDIA_TIMEOUT_MS),
    retries: envValue(env.WIKIPEDIA_RETRIES),
  });
}

import { z } from 'zod';
import type { CacheConfig } from '../config/cache.js';
import type { WikipediaConfig } from '../config/wikipedia.js';
import type { CacheLayer } from '../core/cache.js';
import { failure, success, type ToolResult } from '../core/result.js';
import { ExternalFetchError, fetchJSON } from '../util/fetch.js';

export const WikipediaSummarySchema = z.object({ title: z.string(), summary: z.string(), url: z.string() });
export const WikipediaSectionsSchema = z.object({ title: z.string(), sections: z.array(z.string()) });
export const WikipediaSectionSchema = z.object({ title: z.string(), section: z.string(), content: z.string() });

export type WikipediaSummary = z.infer<typeof WikipediaSummarySchema>;
export type WikipediaSections = z.infer<typeof WikipediaSectionsSchema>;
export type WikipediaSection = z.infer<typeof WikipediaSectionSchema>;

const SearchResponse = z.object({
  query: z.object({ search: z.array(z.object({ title: z.string() })) }),
});

const SummaryResponse = z.object({
  type: z.string().optional(),
  title: z.string(),
  extract: z.string().default(''),
  content_urls: z.object({ desktop: z.object({ page: z.string() }).partial() }).partial().optional(),
});

const ApiError = z.object({ error: z.object({ code: z.string(), info: z.string() }) });

const ParseResponse = z.object({
  parse: z.object({
    title: z.string(),
    sections: z.array(z.object({ line: z.string() })),
  }),
});

const ExtractResponse = z.object({
  query: z.object({
    pages: z.array(z.object({ title: z.string(), missing: z.boolean().optional(), extract: z.string().optional() })),
  }),
});

const NOT_LOADED = 'No Wikipedia page could be loaded for this query.';

function actionUrl(cfg: WikipediaConfig, params: Record<string, string>): string {
  const search = new URLSearchParams({ format: 'json', formatversion: '2', ...params });
  return `https://${cfg.lang}.wikipedia.org/w/api.php?${search.toString()}`;
}

function pageSlug(title: string): string {
  return encodeURIComponent(title.replace(/ /g, '_'));
}

export function pageUrl(cfg: WikipediaConfig, title: string): string {
  return `https://${cfg.lang}.wikipedia.org/wiki/${pageSlug(title)}`;
}

function get(cfg: WikipediaConfig, url: string, target: string): Promise<unknown> {
  return fetchJSON(url, { timeoutMs: cfg.timeoutMs, retries: cfg.retries, target });
}

function upstreamFailure(err: unknown): ToolResult<never> {
  if (err instanceof ExternalFetchError) return failure(`Wikipedia request failed: ${err.message}`);
  throw err;
}

function stripTags(html: string): string {
  return html.replace(/<[^>]+>/g, '').trim();
}

/**
 * Searches Wikipedia and summarizes the best match.
 */
export async function fetchWikipediaInfo(cfg: WikipediaConfig, query: string): Promise<ToolResult<WikipediaSummary>> {
  try {
    const found = SearchResponse.safeParse(
      await get(cfg, actionUrl(cfg, { action: 'query', list: 'search', srsearch: query, srlimit: '6', srprop: '' }), 'wikipedia_search'),
    );
    const titles = found.success ? found.data.query.search.map((hit) => hit.title) : [];
    if (titles.length === 0) return failure('No results found for your query.');

    const [best, ...others] = titles;
    let page: z.infer<typeof SummaryResponse>;
    try {
      const parsed = SummaryResponse.safeParse(
        await get(cfg, `https://${cfg.lang}.wikipedia.org/api/rest_v1/page/summary/${pageSlug(best)}?redirect=true`, 'wikipedia_summary'),
      );
      if (!parsed.success) return failure(NOT_LOADED);
      page = parsed.data;
    } catch (err) {
      if (err instanceof ExternalFetchError && err.status === 404) return failure(NOT_LOADED);
      throw err;
    }

    if (page.type === 'disambiguation') {
      const options = others.slice(0, 5);
      return failure(
        options.length
          ? `Ambiguous topic. Try one of these: ${options.join(', ')}`
          : 'Ambiguous topic. Try a more specific query.',
      );
    }
    return success({
      title: page.title,
      summary: page.extract,
      url: page.content_urls?.desktop?.page ?? pageUrl(cfg, page.title),
    });
  } catch (err) {
    return upstreamFailure(err);
  }
}

/**
 * Flat list of section headings, in article order.
 */
export async function listWikipediaSections(cfg: WikipediaConfig, topic: string): Promise<ToolResult<WikipediaSections>> {
  try {
    const body = await get(cfg, actionUrl(cfg, { action: 'parse', page: topic, prop: 'sections', redirects: '1' }), 'wikipedia_sections');
    const apiError = ApiError.safeParse(body);
    if (apiError.success) return failure(apiError.data.error.info);
    const parsed = ParseResponse.safeParse(body);
    if (!parsed.success) return failure(NOT_LOADED);
    return success({
      title: parsed.data.parse.title,
      sections: parsed.data.parse.sections.map((s) => stripTags(s.line)).filter(Boolean),
    });
  } catch (err) {
    return upstreamFailure(err);
  }
}

const HEADING = /^(={2,6})\s*(.+?)\s*\1\s*$/;

const normalizeHeading = (value: string) => value.replace(/\s+/g, ' ').trim().toLowerCase();

/**
 * Body of the `== heading ==` section in a plain-text extract, including its
 * subsections. Undefined when the heading is absent or the body is empty.
 */
export function extractSection(text: string, heading: string): string | undefined {
  const wanted = normalizeHeading(heading);
  const lines = text.split('\n');
  let depth = 0;
  const body: string[] = [];
  for (const line of lines) {
    const match = HEADING.exec(line);
    if (depth === 0) {
      if (match && normalizeHeading(match[2]) === wanted) depth = match[1].length;
      continue;
    }
    if (match && match[1].length <= depth) break;
    body.push(line);
  }
  const content = body.join('\n').trim();
  return content || undefined;
}

export async function getSectionContent(
  cfg: WikipediaConfig,
  topic: string,
  sectionTitle: string,
): Promise<ToolResult<WikipediaSection>> {
  try {
    const parsed = ExtractResponse.safeParse(
      await get(
        cfg,
        actionUrl(cfg, {
          action: 'query',
          prop: 'extracts',
          explaintext: '1',
          exsectionformat: 'wiki',
          redirects: '1',
          titles: topic,
        }),
        'wikipedia_section',
      ),
    );
    const page = parsed.success ? parsed.data.query.pages[0] : undefined;
    if (!page || page.missing || page.extract === undefined) return failure(NOT_LOADED);
    const content = extractSection(page.extract, sectionTitle);
    if (!content) return failure(`Section '${sectionTitle}' not found in article '${topic}'.`);
    return success({ title: page.title, section: sectionTitle, content });
  } catch (err) {
    return upstreamFailure(err);
  }
}

export interface WikipediaTools {
  fetchWikipediaInfo(query: string): Promise<ToolResult<WikipediaSummary>>;
  listWikipediaSections(topic: string): Promise<ToolResult<WikipediaSections>>;
  getSectionContent(topic: string, sectionTitle: string): Promise<ToolResult<WikipediaSection>>;
}

/**
 * The three lookups behind the cache, each namespace with its own TTL.
 */
export function createWikipediaTools(cache: CacheLayer, cacheCfg: CacheConfig, cfg: WikipediaConfig): WikipediaTools {
  return {
    fetchWikipediaInfo: cache.withCache(
      'search',
      cacheCfg.ttl.search,
      (query: string) => fetchWikipediaInfo(cfg, query),
      WikipediaSummarySchema,
    ),
    listWikipediaSections: cache.withCache(
      'sections',
      cacheCfg.ttl.sections,
      (topic: string) => listWikipediaSections(cfg, topic),
      WikipediaSectionsSchema,
    ),
    getSectionContent: cache.withCache(
      'section',
      cacheCfg.ttl.section,
      (topic: string, sectionTitle: string) => getSectionContent(cfg, topic, sectionTitle),
      WikipediaSectionSchema,
    ),
  };
}

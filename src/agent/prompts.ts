import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';
import { ValidationError } from '../core/errors.js';

export type PromptArgument = { name: string; description: string; required: boolean };

export type PromptInfo = { name: string; description: string; arguments: PromptArgument[] };

type PromptTemplate = PromptInfo & { file: string };

const CATALOG: PromptTemplate[] = [
  {
    name: 'highlight_sections_prompt',
    description: 'Pick the most useful sections of the article on a topic.',
    arguments: [{ name: 'topic', description: 'Article topic', required: true }],
    file: 'highlight_sections.md',
  },
  {
    name: 'summarize_topic',
    description: 'Concise summary of any Wikipedia topic.',
    arguments: [{ name: 'topic', description: 'Topic to summarize', required: true }],
    file: 'summarize_topic.md',
  },
  {
    name: 'compare_topics',
    description: 'Compare two Wikipedia topics side by side.',
    arguments: [
      { name: 'topic1', description: 'First topic', required: true },
      { name: 'topic2', description: 'Second topic', required: true },
    ],
    file: 'compare_topics.md',
  },
  {
    name: 'deep_dive',
    description: 'Explore one aspect of a topic in depth.',
    arguments: [
      { name: 'topic', description: 'Article topic', required: true },
      { name: 'aspect', description: 'Section or aspect to explain', required: true },
    ],
    file: 'deep_dive.md',
  },
];

const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant that answers questions using Wikipedia tools.';

const memo = new Map<string, string>();

function promptsDir(): string {
  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));
  candidates.push(path.join(__dirname, '..', 'prompts'));
  return candidates.find((c) => fs.existsSync(c)) ?? candidates[candidates.length - 1];
}

async function loadTemplate(file: string): Promise<string> {
  const cached = memo.get(file);
  if (cached !== undefined) return cached;
  const text = (await readFile(path.join(promptsDir(), file), 'utf-8')).trim();
  memo.set(file, text);
  return text;
}

export async function loadSystemPrompt(): Promise<string> {
  try {
    return (await loadTemplate('system.md')) || DEFAULT_SYSTEM_PROMPT;
  } catch {
    return DEFAULT_SYSTEM_PROMPT;
  }
}

export function listPrompts(): PromptInfo[] {
  return CATALOG.map(({ name, description, arguments: args }) => ({
    name,
    description,
    arguments: args.map((a) => ({ ...a })),
  }));
}

/**
 * Fills a catalog template. Unknown prompts and missing arguments are
 * validation errors; extra arguments are ignored.
 */
export async function renderPrompt(name: string, args: Record<string, string>): Promise<string> {
  const template = CATALOG.find((p) => p.name === name);
  if (!template) {
    throw new ValidationError(`Unknown prompt: ${name}`, [`promptName: unknown prompt "${name}"`]);
  }
  const missing = template.arguments.filter((a) => a.required && !args[a.name]?.trim()).map((a) => a.name);
  if (missing.length) {
    const issues = missing.map((m) => `arguments.${m}: required`);
    throw new ValidationError(`Missing prompt arguments: ${missing.join(', ')}`, issues);
  }
  const text = await loadTemplate(template.file);
  return template.arguments.reduce((out, a) => out.split(`{${a.name}}`).join(args[a.name] ?? ''), text);
}

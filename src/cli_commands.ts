export type CliCommand =
  | { kind: 'empty' }
  | { kind: 'exit' }
  | { kind: 'help' }
  | { kind: 'stats' }
  | { kind: 'clear'; namespace?: string }
  | { kind: 'history'; limit?: number }
  | { kind: 'thread'; threadId?: string }
  | { kind: 'conversations' }
  | { kind: 'unknown'; name: string }
  | { kind: 'chat'; message: string };

export const CLI_HELP = [
  '/stats                 cache and history statistics',
  '/clear [namespace]     clear cached Wikipedia lookups',
  '/history [n]           messages in the current thread',
  '/thread [id]           show or switch the current thread',
  '/conversations         recent conversations',
  '/help                  this list',
  '/exit                  quit',
].join('\n');

/** Parses one REPL line. Anything not starting with "/" is a chat message. */
export function parseCliInput(line: string): CliCommand {
  const text = line.trim();
  if (!text) return { kind: 'empty' };
  if (!text.startsWith('/')) return { kind: 'chat', message: text };

  const [name, ...rest] = text.slice(1).split(/\s+/);
  const arg = rest.join(' ') || undefined;
  switch (name.toLowerCase()) {
    case 'exit':
    case 'quit':
      return { kind: 'exit' };
    case 'help':
      return { kind: 'help' };
    case 'stats':
      return { kind: 'stats' };
    case 'clear':
      return { kind: 'clear', namespace: arg };
    case 'history': {
      const limit = arg === undefined ? undefined : Number.parseInt(arg, 10);
      return { kind: 'history', limit: limit !== undefined && Number.isFinite(limit) && limit > 0 ? limit : undefined };
    }
    case 'thread':
      return { kind: 'thread', threadId: arg };
    case 'conversations':
      return { kind: 'conversations' };
    default:
      return { kind: 'unknown', name };
  }
}

import 'dotenv/config';
import { loadDatabaseConfig } from '../src/config/database.js';
import { createDatabase, initDatabase } from '../src/db/client.js';
import { createLogger } from '../src/util/logging.js';

async function main(): Promise<void> {
  const log = createLogger();
  const cfg = loadDatabaseConfig({ ...process.env, CONVERSATION_STORE: 'postgres' });
  const handle = createDatabase(cfg, log);
  try {
    await initDatabase(handle, log);
  } finally {
    await handle.pool.end();
  }
}

main().catch((err: unknown) => {
  console.error('Schema initialization failed', err);
  process.exit(1);
});

import 'dotenv/config';
import { createRuntime } from '../core/runtime.js';
import { createApp } from './app.js';

async function main(): Promise<void> {
  const runtime = await createRuntime();
  const { log } = runtime;
  const app = createApp(runtime);

  const port = Number(process.env.PORT ?? 8000);
  const host = process.env.HOST ?? '0.0.0.0';
  const server = app.listen(port, host, () => log.info({ host, port }, 'HTTP server started'));

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, 'shutting down');
    server.close((err) => {
      if (err) log.warn({ err }, 'HTTP server close failed');
      runtime
        .close()
        .then(() => process.exit(0))
        .catch((closeErr: unknown) => {
          log.error({ err: closeErr }, 'runtime close failed');
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('Failed to start server', err);
  process.exit(1);
});

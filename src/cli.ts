import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { createRuntime, type Runtime } from './core/runtime.js';
import { CLI_HELP, parseCliInput } from './cli_commands.js';
import { createLogger, errorMessage } from './util/logging.js';
import { incChatTurn } from './util/metrics.js';

async function printStats(runtime: Runtime): Promise<void> {
  const cache = await runtime.cache.getStats();
  if (cache.status === 'connected') {
    console.log(chalk.cyan(`cache: ${cache.itemCount} items on ${cache.target}, ${cache.hits} hits / ${cache.misses} misses, ${cache.memoryUsed} used`));
  } else {
    console.log(chalk.yellow(`cache: ${cache.status} (${cache.message})`));
  }
  try {
    const db = await runtime.store.getStats();
    console.log(chalk.cyan(`history: ${db.totalConversations} conversations, ${db.totalMessages} messages (${runtime.store.kind})`));
  } catch (err) {
    console.log(chalk.yellow(`history: unavailable (${errorMessage(err)})`));
  }
}

async function chat(runtime: Runtime, threadId: string, message: string): Promise<void> {
  if (!runtime.agent) {
    console.log(chalk.red('Chat is disabled: configure LLM_PROVIDER and its API key.'));
    return;
  }
  try {
    const turn = await runtime.agent.runTurn(message, threadId);
    incChatTurn('ok');
    console.log(`${chalk.green('Assistant:')} ${turn.reply}`);
    try {
      await runtime.store.addMessage(threadId, 'user', message);
      await runtime.store.addMessage(threadId, 'assistant', turn.reply, turn.tokensUsed);
    } catch (err) {
      runtime.log.warn({ err, threadId }, 'conversation history not saved');
    }
  } catch (err) {
    incChatTurn('error');
    console.log(chalk.red(`Error: ${errorMessage(err)}`));
  }
}

async function main(): Promise<void> {
  const log = createLogger({ level: process.env.LOG_LEVEL ?? 'warn' });
  const runtime = await createRuntime({ log });
  const rl = readline.createInterface({ input, output });
  let threadId = 'cli';

  console.log(chalk.bold('Wikipedia chat') + chalk.gray(` (model: ${runtime.agent?.model ?? 'none'}, type /help)`));

  try {
    for (;;) {
      const command = parseCliInput(await rl.question(chalk.blue('You: ')));
      if (command.kind === 'exit') break;
      switch (command.kind) {
        case 'empty':
          break;
        case 'help':
          console.log(CLI_HELP);
          break;
        case 'stats':
          await printStats(runtime);
          break;
        case 'clear': {
          try {
            const cleared = await runtime.cache.clear(command.namespace);
            console.log(chalk.cyan(`Cleared ${cleared} cached items.`));
          } catch (err) {
            console.log(chalk.red(errorMessage(err)));
          }
          break;
        }
        case 'history': {
          try {
            const messages = await runtime.store.getMessages(threadId, { limit: command.limit });
            if (messages.length === 0) console.log(chalk.gray('No messages yet.'));
            for (const m of messages) console.log(`${chalk.gray(m.createdAt.toISOString())} ${chalk.bold(m.role)}: ${m.content}`);
          } catch (err) {
            console.log(chalk.red(`History unavailable: ${errorMessage(err)}`));
          }
          break;
        }
        case 'thread':
          if (command.threadId) threadId = command.threadId;
          console.log(chalk.cyan(`Thread: ${threadId}`));
          break;
        case 'conversations': {
          try {
            const conversations = await runtime.store.listConversations({ limit: 20 });
            if (conversations.length === 0) console.log(chalk.gray('No conversations yet.'));
            for (const c of conversations) console.log(`${chalk.bold(c.threadId)}  ${c.title}  ${chalk.gray(c.updatedAt.toISOString())}`);
          } catch (err) {
            console.log(chalk.red(`History unavailable: ${errorMessage(err)}`));
          }
          break;
        }
        case 'unknown':
          console.log(chalk.yellow(`Unknown command /${command.name}. Type /help.`));
          break;
        case 'chat':
          await chat(runtime, threadId, command.message);
          break;
      }
    }
  } finally {
    rl.close();
    await runtime.close();
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(chalk.red('CLI failed:'), err);
    process.exit(1);
  });
}

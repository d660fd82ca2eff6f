#!/usr/bin/env node

/**
 * Jokebot CLI
 *
 * Runs the HTTP service and the operator commands over the analytics store
 * and the joke dataset.
 */

/* eslint-disable no-console */
import dotenv from 'dotenv';
import { Logger } from 'pino';
import { version } from '../package.json';
import { AnalyticsLog } from './analytics';
import { loadConfig } from './config';
import { collectJokes } from './core/joke-fetcher';
import { createEventStore } from './database';
import { errorMessage } from './errors';
import { buildService, startServer } from './server/server';
import { DEFAULT_VIEW_LIMIT } from './server/routes/analytics';
import { ServiceConfig } from './types';
import { createLogger } from './utils/logger';

const COMMANDS = ['serve', 'stats', 'failed', 'clear-analytics', 'fetch-jokes'] as const;
type Command = typeof COMMANDS[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function intFlag(args: string[], flag: string, fallback: number): number {
  const index = args.indexOf(flag);
  if (index === -1) {
    return fallback;
  }

  const raw = args[index + 1];
  const value = Number(raw);
  if (raw === undefined || !Number.isInteger(value) || value < 1) {
    throw new Error(`${flag} expects a positive integer`);
  }
  return value;
}

async function withAnalytics<T>(
  config: ServiceConfig,
  logger: Logger,
  action: (analytics: AnalyticsLog) => Promise<T>
): Promise<T> {
  const store = createEventStore(config.store);
  await store.init();
  try {
    return await action(new AnalyticsLog(store, { logger }));
  } finally {
    await store.close();
  }
}

async function serve(config: ServiceConfig, logger: Logger): Promise<void> {
  const service = await buildService(config, logger);
  const running = await startServer(service, config.port, logger);
  logger.info({ mode: config.mode }, 'Jokebot started');

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    running.close()
      .then(() => process.exit(0))
      .catch(error => {
        logger.error({ error: errorMessage(error) }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

async function run(command: Command, args: string[], config: ServiceConfig): Promise<void> {
  if (command === 'serve') {
    const logger = createLogger({ level: config.monitoring.logLevel });
    await serve(config, logger);
    return;
  }

  // Data commands keep stdout for their output
  const logger = createLogger({ level: config.monitoring.logLevel, stderr: true });

  switch (command) {
    case 'stats': {
      const stats = await withAnalytics(config, logger, analytics => analytics.getStats());
      console.log(JSON.stringify(stats, null, 2));
      break;
    }
    case 'failed': {
      const limit = intFlag(args, '--limit', DEFAULT_VIEW_LIMIT);
      const report = await withAnalytics(config, logger, async analytics => ({
        failed_queries: await analytics.getFailedQueries(limit),
        backend_failures: await analytics.getBackendFailures(limit)
      }));
      console.log(JSON.stringify(report, null, 2));
      break;
    }
    case 'clear-analytics':
      if (!args.includes('--yes')) {
        throw new Error('Refusing to clear analytics without --yes');
      }
      await withAnalytics(config, logger, analytics => analytics.clear());
      console.log(`Cleared ${config.store.path}`);
      break;
    case 'fetch-jokes': {
      const summary = await collectJokes({
        path: config.jokesPath,
        target: intFlag(args, '--target', 1000),
        batchSize: intFlag(args, '--batch-size', 10),
        maxBatches: intFlag(args, '--max-batches', 500),
        logger
      });
      console.log(`Collected ${summary.added} new jokes in ${summary.batches} batches; ${summary.total} total`);
      break;
    }
  }
}

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  if (argv.includes('--help') || argv.includes('-h')) {
    showHelp();
    return;
  }

  if (argv.includes('--version') || argv.includes('-v')) {
    showVersion();
    return;
  }

  dotenv.config();

  const [first, ...rest] = argv;
  let command: Command = 'serve';
  let args = argv;
  if (first !== undefined && !first.startsWith('-')) {
    if (!isCommand(first)) {
      throw new Error(`Unknown command: ${first}`);
    }
    command = first;
    args = rest;
  }

  await run(command, args, loadConfig(args));
}

function showHelp(): void {
  console.log(`
Jokebot - joke retrieval service with query analytics

Usage: jokebot [command] [options]

Commands:
  serve                  Start the HTTP service (default)
  stats                  Print analytics statistics as JSON
  failed                 Print failed queries and backend failures as JSON
  clear-analytics        Delete every analytics record (requires --yes)
  fetch-jokes            Grow the joke dataset from JokeAPI

Options:
  --help, -h             Show this help message
  --version, -v          Show version information
  --config <path>        JSON config file
  --port <port>          HTTP port (default 8080)
  --jokes <path>         Joke dataset path
  --store <type>         Analytics store: json, jsonl, sqlite
  --store-path <path>    Analytics store location
  --model <id>           OpenRouter model id
  --log-level <level>    Log level (debug, info, warn, error, silent)
  --production           Hide error details in responses
  --limit <n>            Entries per list for 'failed' (default ${DEFAULT_VIEW_LIMIT})
  --target <n>           Dataset size for 'fetch-jokes' (default 1000)
  --batch-size <n>       Jokes per JokeAPI request (default 10)
  --max-batches <n>      Request cap for 'fetch-jokes' (default 500)

Environment Variables:
  PORT, NODE_ENV
  OPENROUTER_API_KEY     Enables model-assisted joke selection
  OPENROUTER_BASE_URL    OpenAI-compatible API base URL
  JOKEBOT_MODEL          Model id
  JOKEBOT_JOKES_PATH     Joke dataset path
  JOKEBOT_STORE_TYPE     Analytics store type
  JOKEBOT_STORE_PATH     Analytics store location
  JOKEBOT_LOG_LEVEL      Log level
  JOKEBOT_CONFIG         JSON config file

Examples:
  # Serve with a SQLite analytics store
  jokebot serve --store sqlite --port 3000

  # Show the 5 most recent failures
  jokebot failed --limit 5
`);
}

function showVersion(): void {
  console.log(`jokebot v${version}`);
}

// Run the CLI
if (require.main === module) {
  main().catch(error => {
    console.error('Error:', errorMessage(error));
    if (process.env.JOKEBOT_LOG_LEVEL === 'debug' && error instanceof Error) {
      console.error(error.stack);
    }
    process.exit(1);
  });
}

export { main };

import { Server } from 'http';
import { Express } from 'express';
import { Logger } from 'pino';
import { AnalyticsLog } from '../analytics';
import { ChatService } from '../core/chat-service';
import { JokeCatalog, loadJokes } from '../core/joke-catalog';
import { JokeIndex } from '../core/joke-index';
import { LanguageModel, OpenRouterModel, UnconfiguredModel } from '../core/llm-client';
import { createEventStore } from '../database';
import { EventStore, ServiceConfig } from '../types';
import { createApp } from './app';

export interface Service {
  app: Express;
  store: EventStore;
  analytics: AnalyticsLog;
  catalog: JokeCatalog;
  index: JokeIndex;
  chat: ChatService;
}

export interface RunningServer {
  server: Server;
  port: number;
  close(): Promise<void>;
}

function createModel(config: ServiceConfig, logger: Logger): LanguageModel {
  if (!config.llm.apiKey) {
    logger.warn('OPENROUTER_API_KEY is not set; answers will use search results only');
    return new UnconfiguredModel();
  }
  return new OpenRouterModel({
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    model: config.llm.model,
    timeoutMs: config.llm.timeoutMs
  });
}

/**
 * Wire the store, catalog, search index and chat service into an express app.
 * `model` replaces the configured language model when given.
 */
export async function buildService(
  config: ServiceConfig,
  logger: Logger,
  model?: LanguageModel
): Promise<Service> {
  const store = createEventStore(config.store);
  await store.init();
  logger.info({ type: config.store.type, path: config.store.path }, 'Analytics store ready');

  const analytics = new AnalyticsLog(store, { logger });

  const catalog = new JokeCatalog(await loadJokes(config.jokesPath, logger));
  const index = new JokeIndex({
    cacheSize: config.search.cacheSize,
    cacheTtlMs: config.search.cacheTtlMs
  });
  const indexed = index.initialize(catalog);
  logger.info({ jokes: catalog.count(), indexed }, `Indexed ${indexed} jokes`);

  const chat = new ChatService({
    catalog,
    search: index,
    model: model ?? createModel(config, logger),
    analytics,
    logger
  });

  const app = createApp({ catalog, chat, analytics, logger, config });

  return { app, store, analytics, catalog, index, chat };
}

export function startServer(service: Service, port: number, logger: Logger): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server = service.app.listen(port);

    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      const boundPort = typeof address === 'object' && address !== null ? address.port : port;
      logger.info({ port: boundPort }, `Server running on port ${boundPort}`);

      resolve({
        server,
        port: boundPort,
        close: async () => {
          await new Promise<void>((done, fail) => {
            server.close(error => (error ? fail(error) : done()));
          });
          logger.info('HTTP server closed');
          await service.store.close();
          logger.info('Analytics store closed');
        }
      });
    });
  });
}

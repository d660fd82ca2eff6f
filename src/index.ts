/**
 * Jokebot - Main TypeScript Entry Point
 *
 * Exports the analytics log, the joke services and the HTTP app factory.
 */

export {
  AnalyticsLog,
  AnalyticsLogOptions,
  AnalyticsLogMetrics,
  QueryIdGenerator,
  computeStats,
  failedQueries,
  recentFailures,
  lowSatisfaction,
  DEFAULT_LOW_RATING_THRESHOLD
} from './analytics';

export {
  createEventStore,
  JsonArrayEventStore,
  JsonlEventStore,
  SqliteAdapter,
  decodeEvent,
  encodeEvent
} from './database';

export { JokeCatalog, loadJokes, formatJoke } from './core/joke-catalog';
export { JokeIndex } from './core/joke-index';
export { ChatService } from './core/chat-service';
export { LanguageModel, OpenRouterModel, UnconfiguredModel } from './core/llm-client';
export { collectJokes, fetchJokeBatch, mergeJokes } from './core/joke-fetcher';

export { createApp } from './server/app';
export { buildService, startServer } from './server/server';
export { loadConfig, defaultConfig } from './config';
export { createLogger } from './utils/logger';

export * from './errors';
export * from './types';

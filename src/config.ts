import * as fs from 'fs';
import * as path from 'path';
import { LogLevel, ServiceConfig, StoreType } from './types';
import { ValidationError, errorMessage } from './errors';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const STORE_TYPES: readonly StoreType[] = ['json', 'jsonl', 'sqlite'];

export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_MODEL = 'openai/gpt-4o-mini';

type Env = Record<string, string | undefined>;
type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function isStoreType(value: unknown): value is StoreType {
  return STORE_TYPES.some(type => type === value);
}

function parsePort(value: string, source: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ValidationError(`Invalid port from ${source}: ${value}`);
  }
  return port;
}

function defaultStorePath(type: StoreType): string {
  switch (type) {
    case 'json':
      return path.resolve('data/analytics.json');
    case 'jsonl':
      return path.resolve('data/analytics.jsonl');
    case 'sqlite':
      return path.resolve('data/analytics.db');
  }
}

export function defaultConfig(): ServiceConfig {
  return {
    mode: 'development',
    port: 8080,
    jokesPath: path.resolve('data/jokes.json'),
    store: {
      type: 'jsonl',
      path: defaultStorePath('jsonl'),
      walMode: true
    },
    llm: {
      baseUrl: DEFAULT_BASE_URL,
      model: DEFAULT_MODEL,
      timeoutMs: 10000
    },
    search: {
      cacheSize: 500,
      cacheTtlMs: 10 * 60 * 1000
    },
    rateLimit: {
      windowMs: 15 * 60 * 1000,
      max: 100
    },
    monitoring: {
      logLevel: 'info'
    }
  };
}

/**
 * Copy the recognized keys of a JSON config file onto the config. Unknown
 * keys and values of the wrong type are ignored.
 */
export function applyFileConfig(config: ServiceConfig, raw: unknown): void {
  if (!isRecord(raw)) {
    return;
  }

  if (raw.mode === 'development' || raw.mode === 'production') config.mode = raw.mode;
  if (typeof raw.port === 'number') config.port = raw.port;
  if (typeof raw.jokesPath === 'string') config.jokesPath = path.resolve(raw.jokesPath);

  if (isRecord(raw.store)) {
    if (isStoreType(raw.store.type)) {
      config.store.type = raw.store.type;
      config.store.path = defaultStorePath(raw.store.type);
    }
    if (typeof raw.store.path === 'string') config.store.path = path.resolve(raw.store.path);
    if (typeof raw.store.walMode === 'boolean') config.store.walMode = raw.store.walMode;
    if (typeof raw.store.busyTimeout === 'number') config.store.busyTimeout = raw.store.busyTimeout;
  }

  if (isRecord(raw.llm)) {
    if (typeof raw.llm.baseUrl === 'string') config.llm.baseUrl = raw.llm.baseUrl;
    if (typeof raw.llm.model === 'string') config.llm.model = raw.llm.model;
    if (typeof raw.llm.timeoutMs === 'number') config.llm.timeoutMs = raw.llm.timeoutMs;
  }

  if (isRecord(raw.search)) {
    if (typeof raw.search.cacheSize === 'number') config.search.cacheSize = raw.search.cacheSize;
    if (typeof raw.search.cacheTtlMs === 'number') config.search.cacheTtlMs = raw.search.cacheTtlMs;
  }

  if (isRecord(raw.rateLimit)) {
    if (typeof raw.rateLimit.windowMs === 'number') config.rateLimit.windowMs = raw.rateLimit.windowMs;
    if (typeof raw.rateLimit.max === 'number') config.rateLimit.max = raw.rateLimit.max;
  }

  if (isRecord(raw.monitoring) && isLogLevel(raw.monitoring.logLevel)) {
    config.monitoring.logLevel = raw.monitoring.logLevel;
  }
}

function applyEnv(config: ServiceConfig, env: Env): void {
  if (env.NODE_ENV === 'production' || env.NODE_ENV === 'development') config.mode = env.NODE_ENV;
  if (env.PORT) config.port = parsePort(env.PORT, 'PORT');
  if (env.JOKEBOT_JOKES_PATH) config.jokesPath = path.resolve(env.JOKEBOT_JOKES_PATH);

  if (env.JOKEBOT_STORE_TYPE) {
    if (!isStoreType(env.JOKEBOT_STORE_TYPE)) {
      throw new ValidationError(`Invalid JOKEBOT_STORE_TYPE: ${env.JOKEBOT_STORE_TYPE}`);
    }
    config.store.type = env.JOKEBOT_STORE_TYPE;
    config.store.path = defaultStorePath(env.JOKEBOT_STORE_TYPE);
  }
  if (env.JOKEBOT_STORE_PATH) config.store.path = path.resolve(env.JOKEBOT_STORE_PATH);

  if (env.OPENROUTER_API_KEY) config.llm.apiKey = env.OPENROUTER_API_KEY;
  if (env.OPENROUTER_BASE_URL) config.llm.baseUrl = env.OPENROUTER_BASE_URL;
  if (env.JOKEBOT_MODEL) config.llm.model = env.JOKEBOT_MODEL;

  if (isLogLevel(env.JOKEBOT_LOG_LEVEL)) config.monitoring.logLevel = env.JOKEBOT_LOG_LEVEL;
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new ValidationError(`Missing value for ${flag}`);
  }
  return value;
}

function applyArgs(config: ServiceConfig, args: string[]): void {
  let storePathSet = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--port':
        config.port = parsePort(requireValue(args, ++i, arg), arg);
        break;
      case '--jokes':
        config.jokesPath = path.resolve(requireValue(args, ++i, arg));
        break;
      case '--store': {
        const type = requireValue(args, ++i, arg);
        if (!isStoreType(type)) {
          throw new ValidationError(`Invalid store type: ${type}`);
        }
        config.store.type = type;
        if (!storePathSet) {
          config.store.path = defaultStorePath(type);
        }
        break;
      }
      case '--store-path':
        config.store.path = path.resolve(requireValue(args, ++i, arg));
        storePathSet = true;
        break;
      case '--model':
        config.llm.model = requireValue(args, ++i, arg);
        break;
      case '--log-level': {
        const level = requireValue(args, ++i, arg);
        if (!isLogLevel(level)) {
          throw new ValidationError(`Invalid log level: ${level}`);
        }
        config.monitoring.logLevel = level;
        break;
      }
      case '--production':
        config.mode = 'production';
        break;
    }
  }
}

function findConfigPath(args: string[], env: Env): string | undefined {
  const index = args.indexOf('--config');
  if (index !== -1) {
    return path.resolve(requireValue(args, index + 1, '--config'));
  }
  return env.JOKEBOT_CONFIG ? path.resolve(env.JOKEBOT_CONFIG) : undefined;
}

/**
 * Build the service configuration. Sources, later ones winning: defaults,
 * JSON config file, environment, command line flags.
 */
export function loadConfig(args: string[] = [], env: Env = process.env): ServiceConfig {
  const config = defaultConfig();

  const configPath = findConfigPath(args, env);
  if (configPath) {
    try {
      applyFileConfig(config, JSON.parse(fs.readFileSync(configPath, 'utf8')));
    } catch (error) {
      throw new Error(`Failed to load config file ${configPath}: ${errorMessage(error)}`);
    }
  }

  applyEnv(config, env);
  applyArgs(config, args);

  return config;
}

import { StoreConfig } from './database';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface ServiceConfig {
  mode: 'development' | 'production';
  port: number;
  jokesPath: string;

  store: StoreConfig;

  llm: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };

  search: {
    cacheSize: number;
    cacheTtlMs: number;
  };

  rateLimit: {
    windowMs: number;
    max: number;
  };

  monitoring: {
    logLevel: LogLevel;
  };
}

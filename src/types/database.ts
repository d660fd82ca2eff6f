import { AnalyticsEvent } from './events';

export interface EventStore {
  init(): Promise<void>;
  close(): Promise<void>;

  append(event: AnalyticsEvent): Promise<void>;
  readAll(): Promise<AnalyticsEvent[]>;

  // Operator action; there is no per-record delete
  clear(): Promise<void>;
}

export type StoreType = 'json' | 'jsonl' | 'sqlite';

export interface StoreConfig {
  type: StoreType;
  path: string;
  walMode: boolean;
  busyTimeout?: number;
}

export interface AnalyticsStats {
  total_queries: number;
  successful_queries: number;
  failed_queries: number;
  no_results_queries: number;
  nsfw_blocked: number;
  success_rate: number;
  avg_response_time_ms: number;
  avg_jokes_per_query: number;
  feedback_count: number;
  avg_rating: number;
  llm_failures: number;
  search_failures: number;
  common_failures: Record<string, number>;
}

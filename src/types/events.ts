export const EVENT_SCHEMA_VERSION = 1;

export type ResponseType = 'success' | 'error' | 'no_results' | 'nsfw_blocked';

export type FailureSource = 'llm' | 'search_backend';

interface EventEnvelope {
  schema_version: number;
  timestamp: string;
}

export interface QueryEvent extends EventEnvelope {
  event_type: 'query';
  query_id: number;
  user_message: string;
  response_type: ResponseType;
  jokes_count: number;
  response_time_ms: number;
  error?: string;
}

export interface FeedbackEvent extends EventEnvelope {
  event_type: 'feedback';
  // Not checked against stored queries; null only appears in legacy records
  query_id: number | null;
  rating: number;
  comment?: string;
}

export interface FailureEvent extends EventEnvelope {
  event_type: 'failure';
  source: FailureSource;
  error_type: string;
  error_message: string;
  fallback_used?: string;
}

export type AnalyticsEvent = QueryEvent | FeedbackEvent | FailureEvent;

export interface QueryInput {
  user_message: string;
  response_type: ResponseType;
  jokes_count: number;
  response_time_ms: number;
  error?: string;
  query_id?: number;
}

export interface FeedbackInput {
  query_id: number | null;
  rating: number;
  comment?: string;
}

export interface FailureInput {
  source: FailureSource;
  error_type: string;
  error_message: string;
  fallback_used?: string;
}

export type LowSatisfactionEntry = FeedbackEvent & { query?: QueryEvent };

import { Logger } from 'pino';
import {
  AnalyticsEvent,
  AnalyticsStats,
  EVENT_SCHEMA_VERSION,
  EventStore,
  FailureEvent,
  FailureInput,
  FeedbackEvent,
  FeedbackInput,
  LowSatisfactionEntry,
  QueryEvent,
  QueryInput
} from '../types';
import { errorMessage } from '../errors';
import {
  DEFAULT_LOW_RATING_THRESHOLD,
  computeStats,
  failedQueries,
  lowSatisfaction,
  recentFailures
} from './aggregator';
import { QueryIdGenerator } from './query-id';

export interface AnalyticsLogOptions {
  logger: Logger;
  clock?: () => Date;
  queryIds?: QueryIdGenerator;
}

export interface AnalyticsLogMetrics {
  recorded: number;
  writeFailures: number;
  lastError?: string;
}

function toUint(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.round(value)) : 0;
}

/**
 * Records query outcomes, feedback and backend failures into an event store
 * and answers the read-side views over the whole store.
 */
export class AnalyticsLog {
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly queryIds: QueryIdGenerator;
  private metrics: AnalyticsLogMetrics = { recorded: 0, writeFailures: 0 };

  constructor(private readonly store: EventStore, options: AnalyticsLogOptions) {
    this.logger = options.logger.child({ component: 'AnalyticsLog' });
    this.clock = options.clock ?? (() => new Date());
    this.queryIds = options.queryIds ?? new QueryIdGenerator();
  }

  nextQueryId(): number {
    return this.queryIds.next();
  }

  async logQuery(input: QueryInput): Promise<QueryEvent> {
    const event: QueryEvent = {
      schema_version: EVENT_SCHEMA_VERSION,
      timestamp: this.clock().toISOString(),
      event_type: 'query',
      query_id: input.query_id ?? this.nextQueryId(),
      user_message: input.user_message,
      response_type: input.response_type,
      jokes_count: toUint(input.jokes_count),
      response_time_ms: toUint(input.response_time_ms),
      ...(input.error !== undefined && { error: input.error })
    };
    await this.append(event);
    return event;
  }

  async logFeedback(input: FeedbackInput): Promise<FeedbackEvent> {
    const event: FeedbackEvent = {
      schema_version: EVENT_SCHEMA_VERSION,
      timestamp: this.clock().toISOString(),
      event_type: 'feedback',
      query_id: input.query_id,
      rating: input.rating,
      ...(input.comment !== undefined && { comment: input.comment })
    };
    await this.append(event);
    return event;
  }

  async logFailure(input: FailureInput): Promise<FailureEvent> {
    const event: FailureEvent = {
      schema_version: EVENT_SCHEMA_VERSION,
      timestamp: this.clock().toISOString(),
      event_type: 'failure',
      source: input.source,
      error_type: input.error_type,
      error_message: input.error_message,
      ...(input.fallback_used !== undefined && { fallback_used: input.fallback_used })
    };
    await this.append(event);
    return event;
  }

  /**
   * Run a write for a user-facing request. A failed write is logged and
   * counted, and resolves to null instead of rejecting.
   */
  async tryRecord<T extends AnalyticsEvent>(write: () => Promise<T>): Promise<T | null> {
    try {
      return await write();
    } catch (error) {
      this.metrics.writeFailures++;
      this.metrics.lastError = errorMessage(error);
      this.logger.error({ error: errorMessage(error) }, 'Failed to record analytics event');
      return null;
    }
  }

  async readAll(): Promise<AnalyticsEvent[]> {
    return this.store.readAll();
  }

  async getStats(): Promise<AnalyticsStats> {
    return computeStats(await this.store.readAll());
  }

  async getFailedQueries(limit?: number): Promise<QueryEvent[]> {
    return failedQueries(await this.store.readAll(), { limit });
  }

  async getBackendFailures(limit?: number): Promise<FailureEvent[]> {
    return recentFailures(await this.store.readAll(), { limit });
  }

  async getLowSatisfaction(
    threshold: number = DEFAULT_LOW_RATING_THRESHOLD,
    limit?: number
  ): Promise<LowSatisfactionEntry[]> {
    return lowSatisfaction(await this.store.readAll(), { threshold, limit });
  }

  async clear(): Promise<void> {
    await this.store.clear();
    this.logger.warn('Analytics store cleared');
  }

  getMetrics(): AnalyticsLogMetrics {
    return { ...this.metrics };
  }

  private async append(event: AnalyticsEvent): Promise<void> {
    await this.store.append(event);
    this.metrics.recorded++;
    this.logger.debug({ eventType: event.event_type }, 'Analytics event recorded');
  }
}

import {
  AnalyticsEvent,
  AnalyticsStats,
  FailureEvent,
  FailureSource,
  FeedbackEvent,
  LowSatisfactionEntry,
  QueryEvent
} from '../types';

export interface ViewOptions {
  limit?: number;
}

export interface FailureViewOptions extends ViewOptions {
  source?: FailureSource;
}

export interface LowSatisfactionOptions extends ViewOptions {
  threshold?: number;
}

export const DEFAULT_LOW_RATING_THRESHOLD = 2;

function mean(total: number, count: number): number {
  return count > 0 ? total / count : 0;
}

function timeOf(event: AnalyticsEvent): number {
  const millis = Date.parse(event.timestamp);
  return Number.isNaN(millis) ? 0 : millis;
}

// Array.prototype.sort is stable, so equal timestamps keep store order
function mostRecentFirst<T extends AnalyticsEvent>(events: T[]): T[] {
  return [...events].sort((a, b) => timeOf(b) - timeOf(a));
}

function applyLimit<T>(items: T[], limit?: number): T[] {
  if (limit === undefined) {
    return items;
  }
  return limit <= 0 ? [] : items.slice(0, limit);
}

function isQuery(event: AnalyticsEvent): event is QueryEvent {
  return event.event_type === 'query';
}

function isFeedback(event: AnalyticsEvent): event is FeedbackEvent {
  return event.event_type === 'feedback';
}

function isFailure(event: AnalyticsEvent): event is FailureEvent {
  return event.event_type === 'failure';
}

/**
 * Summarize a full event sequence in one pass.
 */
export function computeStats(events: AnalyticsEvent[]): AnalyticsStats {
  const stats: AnalyticsStats = {
    total_queries: 0,
    successful_queries: 0,
    failed_queries: 0,
    no_results_queries: 0,
    nsfw_blocked: 0,
    success_rate: 0,
    avg_response_time_ms: 0,
    avg_jokes_per_query: 0,
    feedback_count: 0,
    avg_rating: 0,
    llm_failures: 0,
    search_failures: 0,
    common_failures: {}
  };

  let responseTimeTotal = 0;
  let jokesTotal = 0;
  let ratingTotal = 0;
  const failureCounts = new Map<string, number>();

  for (const event of events) {
    switch (event.event_type) {
      case 'query':
        stats.total_queries++;
        responseTimeTotal += event.response_time_ms;
        jokesTotal += event.jokes_count;
        switch (event.response_type) {
          case 'success':
            stats.successful_queries++;
            break;
          case 'error':
            stats.failed_queries++;
            break;
          case 'no_results':
            stats.no_results_queries++;
            break;
          case 'nsfw_blocked':
            stats.nsfw_blocked++;
            break;
        }
        break;

      case 'feedback':
        stats.feedback_count++;
        ratingTotal += event.rating;
        break;

      case 'failure':
        if (event.source === 'llm') {
          stats.llm_failures++;
        } else {
          stats.search_failures++;
        }
        failureCounts.set(event.error_type, (failureCounts.get(event.error_type) ?? 0) + 1);
        break;
    }
  }

  stats.common_failures = Object.fromEntries(failureCounts);
  stats.avg_response_time_ms = mean(responseTimeTotal, stats.total_queries);
  stats.avg_jokes_per_query = mean(jokesTotal, stats.total_queries);
  stats.avg_rating = mean(ratingTotal, stats.feedback_count);
  stats.success_rate = stats.total_queries > 0
    ? (stats.successful_queries / stats.total_queries) * 100
    : 0;

  return stats;
}

/**
 * Queries that ended in an error or found nothing, most recent first.
 */
export function failedQueries(events: AnalyticsEvent[], options: ViewOptions = {}): QueryEvent[] {
  const failed = events
    .filter(isQuery)
    .filter(event => event.response_type === 'error' || event.response_type === 'no_results');

  return applyLimit(mostRecentFirst(failed), options.limit);
}

/**
 * Backend failures (language model or search), most recent first.
 */
export function recentFailures(events: AnalyticsEvent[], options: FailureViewOptions = {}): FailureEvent[] {
  const failures = events
    .filter(isFailure)
    .filter(event => options.source === undefined || event.source === options.source);

  return applyLimit(mostRecentFirst(failures), options.limit);
}

/**
 * Feedback rated at or below the threshold, most recent first, joined with
 * the query it refers to when that query is in the store.
 */
export function lowSatisfaction(
  events: AnalyticsEvent[],
  options: LowSatisfactionOptions = {}
): LowSatisfactionEntry[] {
  const threshold = options.threshold ?? DEFAULT_LOW_RATING_THRESHOLD;

  // query_id is only unique best-effort; the latest query with an id wins
  const queriesById = new Map<number, QueryEvent>();
  for (const event of events) {
    if (isQuery(event)) {
      queriesById.set(event.query_id, event);
    }
  }

  const lowRated = events
    .filter(isFeedback)
    .filter(event => event.rating <= threshold);

  return applyLimit(mostRecentFirst(lowRated), options.limit).map(feedback => {
    const query = feedback.query_id !== null ? queriesById.get(feedback.query_id) : undefined;
    return query ? { ...feedback, query } : { ...feedback };
  });
}

import {
  computeStats,
  failedQueries,
  lowSatisfaction,
  recentFailures
} from '../../src/analytics/aggregator';
import { failureEvent, feedbackEvent, queryEvent } from '../fixtures/events';

describe('computeStats', () => {
  it('should return zeros for an empty log', () => {
    expect(computeStats([])).toEqual({
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
    });
  });

  it('should count response types and average response time', () => {
    const stats = computeStats([
      queryEvent({ response_type: 'success', response_time_ms: 850, jokes_count: 3 }),
      queryEvent({ response_type: 'no_results', response_time_ms: 300, jokes_count: 0 })
    ]);

    expect(stats.total_queries).toBe(2);
    expect(stats.successful_queries).toBe(1);
    expect(stats.no_results_queries).toBe(1);
    expect(stats.success_rate).toBe(50);
    expect(stats.avg_response_time_ms).toBe(575);
    expect(stats.avg_jokes_per_query).toBe(1.5);
  });

  it('should count errors and blocked requests', () => {
    const stats = computeStats([
      queryEvent({ response_type: 'error' }),
      queryEvent({ response_type: 'nsfw_blocked', jokes_count: 0 }),
      queryEvent({ response_type: 'nsfw_blocked', jokes_count: 0 })
    ]);

    expect(stats.failed_queries).toBe(1);
    expect(stats.nsfw_blocked).toBe(2);
    expect(stats.success_rate).toBe(0);
  });

  it('should average feedback ratings', () => {
    const stats = computeStats([feedbackEvent({ rating: 5 }), feedbackEvent({ rating: 1 })]);

    expect(stats.feedback_count).toBe(2);
    expect(stats.avg_rating).toBe(3);
    expect(stats.total_queries).toBe(0);
  });

  it('should count failures by source and error type', () => {
    const stats = computeStats([
      failureEvent({ source: 'llm', error_type: 'llm_selection_error' }),
      failureEvent({ source: 'llm', error_type: 'llm_topic_error' }),
      failureEvent({ source: 'search_backend', error_type: 'search_error' }),
      failureEvent({ source: 'llm', error_type: 'llm_selection_error' })
    ]);

    expect(stats.llm_failures).toBe(3);
    expect(stats.search_failures).toBe(1);
    expect(stats.common_failures).toEqual({
      llm_selection_error: 2,
      llm_topic_error: 1,
      search_error: 1
    });
  });

  it('should count error types that share a name with object members', () => {
    const stats = computeStats([
      failureEvent({ error_type: 'constructor' }),
      failureEvent({ error_type: 'toString' }),
      failureEvent({ error_type: '__proto__' }),
      failureEvent({ error_type: 'constructor' })
    ]);

    expect(Object.keys(stats.common_failures)).toEqual(['constructor', 'toString', '__proto__']);
    expect(stats.common_failures.constructor).toBe(2);
    expect(stats.common_failures.toString).toBe(1);
    expect(Object.getOwnPropertyDescriptor(stats.common_failures, '__proto__')?.value).toBe(1);
  });
});

describe('failedQueries', () => {
  const events = [
    queryEvent({ query_id: 1, response_type: 'error', timestamp: '2024-05-01T10:00:00.000Z' }),
    queryEvent({ query_id: 2, response_type: 'success', timestamp: '2024-05-01T11:00:00.000Z' }),
    queryEvent({ query_id: 3, response_type: 'no_results', timestamp: '2024-05-01T12:00:00.000Z' }),
    feedbackEvent(),
    queryEvent({ query_id: 4, response_type: 'nsfw_blocked', timestamp: '2024-05-01T13:00:00.000Z' }),
    queryEvent({ query_id: 5, response_type: 'error', timestamp: '2024-05-01T12:00:00.000Z' })
  ];

  it('should return error and no-result queries most recent first', () => {
    expect(failedQueries(events).map(event => event.query_id)).toEqual([3, 5, 1]);
  });

  it('should cap the result to the limit', () => {
    expect(failedQueries(events, { limit: 2 }).map(event => event.query_id)).toEqual([3, 5]);
  });

  it('should return nothing for a zero limit', () => {
    expect(failedQueries(events, { limit: 0 })).toEqual([]);
  });
});

describe('recentFailures', () => {
  const events = [
    failureEvent({ source: 'llm', error_message: 'a', timestamp: '2024-05-01T10:00:00.000Z' }),
    failureEvent({ source: 'search_backend', error_message: 'b', timestamp: '2024-05-01T11:00:00.000Z' }),
    queryEvent(),
    failureEvent({ source: 'llm', error_message: 'c', timestamp: '2024-05-01T12:00:00.000Z' })
  ];

  it('should list failures most recent first', () => {
    expect(recentFailures(events).map(event => event.error_message)).toEqual(['c', 'b', 'a']);
  });

  it('should filter by source', () => {
    expect(recentFailures(events, { source: 'llm', limit: 1 }).map(event => event.error_message))
      .toEqual(['c']);
  });
});

describe('lowSatisfaction', () => {
  it('should join low ratings with their query', () => {
    const query = queryEvent({ query_id: 42, user_message: 'a dog joke' });
    const feedback = feedbackEvent({ query_id: 42, rating: 1 });

    expect(lowSatisfaction([query, feedback, feedbackEvent({ query_id: 42, rating: 5 })]))
      .toEqual([{ ...feedback, query }]);
  });

  it('should keep feedback for unknown queries without a join', () => {
    const feedback = feedbackEvent({ query_id: 7, rating: 2 });

    const [entry] = lowSatisfaction([feedback]);
    expect(entry).toEqual(feedback);
    expect(entry).not.toHaveProperty('query');
  });

  it('should use the latest query sharing an id', () => {
    const older = queryEvent({ query_id: 9, user_message: 'first' });
    const newer = queryEvent({ query_id: 9, user_message: 'second' });

    const [entry] = lowSatisfaction([older, newer, feedbackEvent({ query_id: 9, rating: 1 })]);
    expect(entry.query?.user_message).toBe('second');
  });

  it('should apply the threshold and order by recency', () => {
    const events = [
      feedbackEvent({ query_id: null, rating: 3, timestamp: '2024-05-01T10:00:00.000Z' }),
      feedbackEvent({ query_id: null, rating: 2, timestamp: '2024-05-01T11:00:00.000Z' }),
      feedbackEvent({ query_id: null, rating: 1, timestamp: '2024-05-01T12:00:00.000Z' })
    ];

    expect(lowSatisfaction(events, { threshold: 3 }).map(entry => entry.rating)).toEqual([1, 2, 3]);
    expect(lowSatisfaction(events).map(entry => entry.rating)).toEqual([1, 2]);
    expect(lowSatisfaction(events, { limit: 1 }).map(entry => entry.rating)).toEqual([1]);
  });
});

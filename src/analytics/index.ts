export { AnalyticsLog, AnalyticsLogOptions, AnalyticsLogMetrics } from './analytics-log';
export {
  computeStats,
  failedQueries,
  recentFailures,
  lowSatisfaction,
  DEFAULT_LOW_RATING_THRESHOLD,
  ViewOptions,
  FailureViewOptions,
  LowSatisfactionOptions
} from './aggregator';
export { QueryIdGenerator } from './query-id';

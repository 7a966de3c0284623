// Option keys read by the request logger, and their defaults

export const RequestLoggerOption = {
  SUCCESS_ENABLED: 'advanced.request-tracker.logs.success.enabled',
  SLOW_ENABLED: 'advanced.request-tracker.logs.slow.enabled',
  SLOW_THRESHOLD: 'advanced.request-tracker.logs.slow.threshold',
  ERROR_ENABLED: 'advanced.request-tracker.logs.error.enabled',
  MAX_QUERY_LENGTH: 'advanced.request-tracker.logs.max-query-length',
  SHOW_VALUES: 'advanced.request-tracker.logs.show-values',
  MAX_VALUES: 'advanced.request-tracker.logs.max-values',
  MAX_VALUE_LENGTH: 'advanced.request-tracker.logs.max-value-length',
  SHOW_STACK_TRACES: 'advanced.request-tracker.logs.show-stack-traces',
} as const;

export type RequestLoggerOptionKey =
  (typeof RequestLoggerOption)[keyof typeof RequestLoggerOption];

export interface LoggingPolicy {
  successEnabled: boolean;
  slowEnabled: boolean;
  slowThresholdNanos: number;
  errorEnabled: boolean;
  maxQueryLength: number;
  showValues: boolean;
  maxValues: number;
  maxValueLength: number;
  showStackTraces: boolean;
}

export const DEFAULT_LOGGING_POLICY: Readonly<LoggingPolicy> = {
  successEnabled: false,
  slowEnabled: false,
  // Unbounded: nothing is slow unless a threshold is configured
  slowThresholdNanos: Number.POSITIVE_INFINITY,
  errorEnabled: false,
  maxQueryLength: 500,
  showValues: false,
  maxValues: 0,
  maxValueLength: 0,
  showStackTraces: false,
};

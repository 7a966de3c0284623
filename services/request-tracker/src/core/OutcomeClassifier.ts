/**
 * Outcome classification: which logging category a completed request falls into.
 *
 * Runs on every request completion, so boolean gates are read first and the
 * slow threshold is only looked up when at least one success category is enabled.
 */

import { ConfigProfile } from '../config/ConfigProfile';
import { DEFAULT_LOGGING_POLICY, RequestLoggerOption } from '../config/options';
import { CompletionEvent } from './events';

export type OutcomeCategory = 'slow' | 'success' | 'error' | 'suppressed';

export type LoggableCategory = Exclude<OutcomeCategory, 'suppressed'>;

export function classifyOutcome(event: CompletionEvent, profile: ConfigProfile): OutcomeCategory {
  switch (event.kind) {
    case 'success':
      return classifySuccess(event.latencyNanos, profile);
    case 'error':
      return profile.getBool(RequestLoggerOption.ERROR_ENABLED, DEFAULT_LOGGING_POLICY.errorEnabled)
        ? 'error'
        : 'suppressed';
    // Node-level outcomes carry no logging policy of their own
    case 'nodeSuccess':
    case 'nodeError':
      return 'suppressed';
  }
}

function classifySuccess(latencyNanos: number, profile: ConfigProfile): OutcomeCategory {
  const successEnabled = profile.getBool(
    RequestLoggerOption.SUCCESS_ENABLED,
    DEFAULT_LOGGING_POLICY.successEnabled
  );
  const slowEnabled = profile.getBool(
    RequestLoggerOption.SLOW_ENABLED,
    DEFAULT_LOGGING_POLICY.slowEnabled
  );
  if (!successEnabled && !slowEnabled) {
    return 'suppressed';
  }

  const slowThresholdNanos = profile.getDuration(
    RequestLoggerOption.SLOW_THRESHOLD,
    DEFAULT_LOGGING_POLICY.slowThresholdNanos
  );
  const isSlow = latencyNanos > slowThresholdNanos;

  if (isSlow) {
    return slowEnabled ? 'slow' : 'suppressed';
  }
  return successEnabled ? 'success' : 'suppressed';
}

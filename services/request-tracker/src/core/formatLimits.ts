// Formatting limits resolved from a profile for one log record

import { checkNonNegative } from '@querylog/shared';
import { ConfigProfile } from '../config/ConfigProfile';
import { DEFAULT_LOGGING_POLICY, LoggingPolicy, RequestLoggerOption } from '../config/options';
import { LoggableCategory } from './OutcomeClassifier';

export type FormatLimits = Pick<
  LoggingPolicy,
  'maxQueryLength' | 'showValues' | 'maxValues' | 'maxValueLength' | 'showStackTraces'
>;

export function resolveFormatLimits(profile: ConfigProfile, category: LoggableCategory): FormatLimits {
  return {
    maxQueryLength: profile.getInt(
      RequestLoggerOption.MAX_QUERY_LENGTH,
      DEFAULT_LOGGING_POLICY.maxQueryLength
    ),
    showValues: profile.getBool(RequestLoggerOption.SHOW_VALUES, DEFAULT_LOGGING_POLICY.showValues),
    maxValues: profile.getInt(RequestLoggerOption.MAX_VALUES, DEFAULT_LOGGING_POLICY.maxValues),
    maxValueLength: profile.getInt(
      RequestLoggerOption.MAX_VALUE_LENGTH,
      DEFAULT_LOGGING_POLICY.maxValueLength
    ),
    // Stack traces only matter for errors
    showStackTraces:
      category === 'error' &&
      profile.getBool(RequestLoggerOption.SHOW_STACK_TRACES, DEFAULT_LOGGING_POLICY.showStackTraces),
  };
}

export function checkFormatLimits(limits: FormatLimits): void {
  checkNonNegative(limits.maxQueryLength, 'maxQueryLength');
  checkNonNegative(limits.maxValues, 'maxValues');
  checkNonNegative(limits.maxValueLength, 'maxValueLength');
}

// Configuration for the request tracker
// Loads environment variables into a configuration profile

import { LogLevel, parseLogLevel } from '@querylog/shared';
import { MapConfigProfile } from './ConfigProfile';
import { RequestLoggerOption, RequestLoggerOptionKey } from './options';

export interface Config {
  sessionName: string;
  logLevel: LogLevel;
  profile: MapConfigProfile;
}

const ENV_TO_OPTION: Record<string, RequestLoggerOptionKey> = {
  REQUEST_LOGGER_SUCCESS_ENABLED: RequestLoggerOption.SUCCESS_ENABLED,
  REQUEST_LOGGER_SLOW_ENABLED: RequestLoggerOption.SLOW_ENABLED,
  REQUEST_LOGGER_SLOW_THRESHOLD: RequestLoggerOption.SLOW_THRESHOLD,
  REQUEST_LOGGER_ERROR_ENABLED: RequestLoggerOption.ERROR_ENABLED,
  REQUEST_LOGGER_MAX_QUERY_LENGTH: RequestLoggerOption.MAX_QUERY_LENGTH,
  REQUEST_LOGGER_SHOW_VALUES: RequestLoggerOption.SHOW_VALUES,
  REQUEST_LOGGER_MAX_VALUES: RequestLoggerOption.MAX_VALUES,
  REQUEST_LOGGER_MAX_VALUE_LENGTH: RequestLoggerOption.MAX_VALUE_LENGTH,
  REQUEST_LOGGER_STACK_TRACES: RequestLoggerOption.SHOW_STACK_TRACES,
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const values: Record<string, string> = {};
  for (const [variable, option] of Object.entries(ENV_TO_OPTION)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      values[option] = value;
    }
  }

  return {
    sessionName: env.SESSION_NAME || 's0',
    logLevel: parseLogLevel(env.LOG_LEVEL),
    profile: new MapConfigProfile(values),
  };
}

/**
 * Structured JSON Logger
 * One JSON entry per line on stdout
 */

import { LogEntry, LogLevel, LogSink } from '../types/logging.types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return 'DEBUG';
    case 'info':
      return 'INFO';
    case 'warn':
    case 'warning':
      return 'WARNING';
    case 'error':
      return 'ERROR';
    case 'critical':
      return 'CRITICAL';
    default:
      return fallback;
  }
}

export class Logger implements LogSink {
  constructor(
    private component: string,
    private minLevel: LogLevel = 'DEBUG'
  ) {}

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.write('DEBUG', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.write('INFO', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.write('WARNING', message, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.write('ERROR', message, metadata, error);
  }

  critical(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.write('CRITICAL', message, metadata, error);
  }

  log(severity: LogLevel, message: string, error?: Error): void {
    this.write(severity, message, undefined, error);
  }

  isEnabled(severity: LogLevel): boolean {
    return LEVEL_ORDER[severity] >= LEVEL_ORDER[this.minLevel];
  }

  private write(
    severity: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isEnabled(severity)) {
      return;
    }

    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      component: this.component,
      ...(metadata && { metadata }),
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
        },
      }),
    };

    console.log(JSON.stringify(entry));
  }
}

export function createLogger(component: string, minLevel?: LogLevel): Logger {
  return new Logger(component, minLevel);
}

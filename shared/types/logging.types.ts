/**
 * Logging types shared by the structured logger and the request tracker
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export interface LogEntry {
  severity: LogLevel;
  message: string;
  timestamp: string;
  component: string;
  metadata?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Destination for formatted log records.
 *
 * The error argument is only passed when the full diagnostic object must be
 * attached to the record rather than summarized inside the message.
 */
export interface LogSink {
  log(severity: LogLevel, message: string, error?: Error): void;
}

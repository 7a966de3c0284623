/**
 * RequestLogger - request tracker that writes one log record per completed request
 *
 * Flow per event:
 * 1. Check preconditions (request, node and error present, latency a non-negative integer)
 * 2. Classify the outcome; suppressed events stop here
 * 3. Resolve formatting limits from the same profile
 * 4. Format and emit to the sink
 */

import {
  LogSink,
  PreconditionError,
  PreconditionErrorCodes,
  createLogger,
} from '@querylog/shared';
import { Config, loadConfig } from '../config/config';
import { ConfigProfile } from '../config/ConfigProfile';
import { CompletionEvent, ErrorEvent, RequestCompletionEvent, SuccessEvent } from './events';
import { resolveFormatLimits } from './formatLimits';
import { LoggableCategory, classifyOutcome } from './OutcomeClassifier';
import { FormattedLogRecord, RequestLogFormatter } from './RequestLogFormatter';
import { RequestTracker } from './RequestTracker';

const defaultSink = createLogger('request-tracker');

export class RequestLogger implements RequestTracker {
  constructor(
    private readonly logPrefix: string,
    private readonly formatter: RequestLogFormatter = new RequestLogFormatter(),
    private readonly sink: LogSink = defaultSink
  ) {}

  onCompletion(event: CompletionEvent, profile: ConfigProfile): void {
    checkEvent(event);

    const category = classifyOutcome(event, profile);
    if (category === 'suppressed') {
      return;
    }

    switch (event.kind) {
      case 'success':
        this.logSuccess(event, this.format(event, category, profile));
        return;
      case 'error':
        this.logError(event, this.format(event, category, profile));
        return;
      case 'nodeSuccess':
      case 'nodeError':
        return;
    }
  }

  close(): void {
    // No resources held
  }

  private format(
    event: RequestCompletionEvent,
    category: LoggableCategory,
    profile: ConfigProfile
  ): FormattedLogRecord {
    return this.formatter.format(
      event,
      category,
      resolveFormatLimits(profile, category),
      this.logPrefix
    );
  }

  protected logSuccess(_event: SuccessEvent, record: FormattedLogRecord): void {
    this.sink.log(record.severity, record.text);
  }

  protected logError(_event: ErrorEvent, record: FormattedLogRecord): void {
    if (record.error) {
      this.sink.log(record.severity, record.text, record.error);
    } else {
      this.sink.log(record.severity, record.text);
    }
  }
}

/**
 * Tracker for a session configured from the environment: the session name
 * becomes the log prefix and LOG_LEVEL filters what the default sink writes.
 */
export function createRequestLogger(config: Config = loadConfig()): RequestLogger {
  return new RequestLogger(
    config.sessionName,
    new RequestLogFormatter(),
    createLogger('request-tracker', config.logLevel)
  );
}

function checkEvent(event: CompletionEvent): void {
  if (!event.request) {
    throw new PreconditionError(
      'Completion event has no request',
      PreconditionErrorCodes.MISSING_REQUEST,
      'request',
      { kind: event.kind }
    );
  }

  // Only a failed request may lack a node: it can fail before any node is tried
  if (!event.node && event.kind !== 'error') {
    throw new PreconditionError(
      'Completion event has no node',
      PreconditionErrorCodes.MISSING_NODE,
      'node',
      { kind: event.kind }
    );
  }

  if ((event.kind === 'error' || event.kind === 'nodeError') && !event.error) {
    throw new PreconditionError(
      'Error completion event has no error',
      PreconditionErrorCodes.MISSING_ERROR,
      'error',
      { kind: event.kind }
    );
  }

  const latency = event.latencyNanos;
  if (!Number.isSafeInteger(latency)) {
    throw new PreconditionError(
      `Latency must be an integer number of nanoseconds, got ${latency}`,
      PreconditionErrorCodes.INVALID_LATENCY,
      'latencyNanos',
      { kind: event.kind }
    );
  }
  if (latency < 0) {
    throw new PreconditionError(
      `Latency must be non-negative, got ${latency}`,
      PreconditionErrorCodes.NEGATIVE_LATENCY,
      'latencyNanos',
      { kind: event.kind, latencyNanos: latency }
    );
  }
}

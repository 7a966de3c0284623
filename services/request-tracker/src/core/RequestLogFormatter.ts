/**
 * RequestLogFormatter - builds the text of one request log record
 *
 * Layout, parts separated by single spaces:
 *   [prefix|node] [Outcome] (latency) [stats] query [name=value, ...] [error summary]
 *
 * Every user-controlled piece (query text, each bound value) is cut to its
 * configured limit so a record stays bounded whatever the request carries.
 */

import {
  FURTHER_VALUES_TRUNCATED,
  LogLevel,
  TRUNCATED,
  formatNanos,
  truncate,
} from '@querylog/shared';
import { boundValues, queryText, statementCount } from '../request/describe';
import { NamedValue, Node, Request } from '../request/types';
import { RequestCompletionEvent } from './events';
import { FormatLimits, checkFormatLimits } from './formatLimits';
import { LoggableCategory } from './OutcomeClassifier';

export interface FormattedLogRecord {
  text: string;
  severity: LogLevel;
  /** Set only when the full error must be attached to the record */
  error?: Error;
}

const OUTCOME_TAGS: Record<LoggableCategory, string> = {
  success: '[Success]',
  slow: '[Slow]',
  error: '[Error]',
};

const NO_NODE = 'N/A';

export class RequestLogFormatter {
  format(
    event: RequestCompletionEvent,
    category: LoggableCategory,
    limits: FormatLimits,
    logPrefix: string
  ): FormattedLogRecord {
    checkFormatLimits(limits);

    const parts = [
      this.prefix(logPrefix, event.node),
      OUTCOME_TAGS[category],
      `(${formatNanos(event.latencyNanos)})`,
      ...this.requestParts(event.request, limits),
    ];

    let attached: Error | undefined;
    if (event.kind === 'error') {
      if (limits.showStackTraces) {
        attached = event.error;
      } else {
        parts.push(`[${summarizeError(event.error)}]`);
      }
    }

    return {
      text: parts.filter((part) => part.length > 0).join(' '),
      severity: category === 'error' ? 'ERROR' : 'INFO',
      ...(attached && { error: attached }),
    };
  }

  /**
   * Statistics, query text and values of a request, without prefix or outcome
   */
  describeRequest(request: Request, limits: FormatLimits): string {
    checkFormatLimits(limits);
    return this.requestParts(request, limits)
      .filter((part) => part.length > 0)
      .join(' ');
  }

  private prefix(logPrefix: string, node: Node | undefined): string {
    return `[${logPrefix}|${node?.endPoint ?? NO_NODE}]`;
  }

  private requestParts(request: Request, limits: FormatLimits): string[] {
    // maxValues=0 hides values even when showValues is on
    const showValues = limits.showValues && limits.maxValues > 0;
    const values = showValues ? boundValues(request) : [];
    const parts: string[] = [];

    if (request.kind === 'batch') {
      const statements = `${statementCount(request)} statements`;
      parts.push(showValues ? `[${statements}, ${values.length} values]` : `[${statements}]`);
    } else if (values.length > 0) {
      parts.push(`[${values.length} values]`);
    }

    if (limits.maxQueryLength > 0) {
      parts.push(truncate(queryText(request, limits.maxQueryLength), limits.maxQueryLength));
    }

    if (values.length > 0) {
      parts.push(this.describeValues(values, limits.maxValues, limits.maxValueLength));
    }

    return parts;
  }

  private describeValues(values: NamedValue[], maxValues: number, maxValueLength: number): string {
    const rendered = values
      .slice(0, maxValues)
      .map(({ name, value }) => `${name}=${renderValue(value, maxValueLength)}`);

    if (values.length > maxValues) {
      rendered.push(FURTHER_VALUES_TRUNCATED);
    }

    return `[${rendered.join(', ')}]`;
  }
}

/**
 * Render a bound value, cutting its raw text to `maxLength` before any quoting.
 *
 * @example
 * renderValue("it's", 10) // "'it''s'"
 * renderValue('abcdef', 3) // "'abc'...<truncated>"
 * renderValue(12345, 3) // "123...<truncated>"
 */
export function renderValue(value: unknown, maxLength: number): string {
  if (value === null || value === undefined) {
    return 'NULL';
  }

  if (typeof value === 'string') {
    const raw = truncate(value, maxLength, '');
    const marker = raw.length < value.length ? TRUNCATED : '';
    return `'${raw.replace(/'/g, "''")}'${marker}`;
  }

  return truncate(rawText(value, maxLength), maxLength);
}

function rawText(value: unknown, maxLength: number): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }

  if (value instanceof Uint8Array) {
    // Two hex digits per byte: one byte past the limit is enough to trigger the marker
    const bytes = value.subarray(0, Math.ceil(maxLength / 2) + 1);
    return `0x${Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex')}`;
  }

  if (typeof value === 'object' && value !== null) {
    try {
      return JSON.stringify(value, jsonReplacer) ?? objectTag(value);
    } catch {
      // Circular structures
      return objectTag(value);
    }
  }

  return String(value);
}

function jsonReplacer(_key: string, inner: unknown): unknown {
  if (typeof inner === 'bigint') {
    return inner.toString();
  }
  if (inner instanceof Map) {
    return [...inner.entries()];
  }
  if (inner instanceof Set) {
    return [...inner];
  }
  return inner;
}

// Works for objects without a prototype, where String() throws
function objectTag(value: object): string {
  return Object.prototype.toString.call(value);
}

/**
 * One-line summary of an error: "Name: message", newlines folded into spaces
 */
export function summarizeError(error: Error): string {
  return String(error).replace(/\s*[\r\n]+\s*/g, ' ');
}

/**
 * PreconditionError - a caller broke the contract of an operation
 * (negative latency, negative limit, missing request, node or error). Never retried or coerced.
 */

import { AppError } from './AppError';

export class PreconditionError extends AppError<PreconditionErrorCode> {
  public readonly argument: string;

  constructor(
    message: string,
    code: PreconditionErrorCode,
    argument: string,
    context?: Record<string, unknown>
  ) {
    super(message, code, { context });
    this.name = 'PreconditionError';
    this.argument = argument;
  }

  toJSON() {
    return {
      ...super.toJSON(),
      argument: this.argument,
    };
  }
}

export const PreconditionErrorCodes = {
  NEGATIVE_LATENCY: 'NEGATIVE_LATENCY',
  INVALID_LATENCY: 'INVALID_LATENCY',
  NEGATIVE_LIMIT: 'NEGATIVE_LIMIT',
  MISSING_REQUEST: 'MISSING_REQUEST',
  MISSING_NODE: 'MISSING_NODE',
  MISSING_ERROR: 'MISSING_ERROR',
} as const;

export type PreconditionErrorCode =
  (typeof PreconditionErrorCodes)[keyof typeof PreconditionErrorCodes];

export function checkNonNegative(value: number, argument: string): void {
  if (Number.isNaN(value) || value < 0) {
    throw new PreconditionError(
      `${argument} must be non-negative, got ${value}`,
      PreconditionErrorCodes.NEGATIVE_LIMIT,
      argument,
      { value }
    );
  }
}

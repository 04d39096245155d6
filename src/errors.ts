/**
 * Error taxonomy for a parallel range download. Nothing is recovered
 * locally: each of these surfaces to the caller and aborts the transfer.
 */

export type ErrorCode = 'ARGUMENT_ERROR' | 'SIZE_UNAVAILABLE' | 'TRANSFER_ERROR';

export class RangeFetchError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RangeFetchError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Missing or unusable command-line input. Raised before any request is sent.
 */
export class ArgumentError extends RangeFetchError {
  constructor(message: string, cause?: Error) {
    super(message, 'ARGUMENT_ERROR', cause);
    this.name = 'ArgumentError';
  }
}

/**
 * The metadata response carried no usable content-length.
 */
export class SizeUnavailableError extends RangeFetchError {
  constructor(message: string, public readonly headerValue: string | null) {
    super(message, 'SIZE_UNAVAILABLE');
    this.name = 'SizeUnavailableError';
  }
}

export interface FailedRange {
  index: number;
  header: string;
}

/**
 * A request, response or body stream failed. `range` is set when a worker raised it.
 */
export class TransferError extends RangeFetchError {
  constructor(message: string, public readonly range?: FailedRange, cause?: Error) {
    super(message, 'TRANSFER_ERROR', cause);
    this.name = 'TransferError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

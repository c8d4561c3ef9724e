/**
 * Error taxonomy for the runner.
 *
 * Only ConfigurationError is allowed to escape runBatch; everything else is
 * recorded on the result structures.
 */

export class ProbeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProbeError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export type TransportErrorCode = 'timeout' | 'connection_refused' | 'dns' | 'reset' | 'network';

/**
 * The request never produced a response.
 * Examples: connection refused, timeout, DNS resolution failure
 */
export class TransportError extends ProbeError {
  constructor(
    message: string,
    public readonly code: TransportErrorCode = 'network',
    public readonly url?: string
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/** An assertion could not be computed against a response. */
export class EvaluationError extends ProbeError {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluationError';
  }
}

/** A test definition is malformed. */
export class ValidationError extends ProbeError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Caller misuse, e.g. a non-positive concurrency limit or an unknown CLI flag. */
export class ConfigurationError extends ProbeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

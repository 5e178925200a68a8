import { ShipkitError } from '@shipkit/shared';

/**
 * Media error codes for structured error handling
 */
export const MEDIA_ERROR_CODES = {
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  INTEGRITY_ERROR: 'INTEGRITY_ERROR',
  RESERVE_ERROR: 'RESERVE_ERROR',
  CARDINALITY_MISMATCH: 'CARDINALITY_MISMATCH',
  NOT_FOUND: 'NOT_FOUND',
} as const;

export class TransportError extends ShipkitError {
  constructor(
    message: string,
    public retryable: boolean,
    public statusCode?: number
  ) {
    super(message, MEDIA_ERROR_CODES.TRANSPORT_ERROR, { retryable, statusCode });
    this.name = 'TransportError';
  }
}

export class IntegrityError extends ShipkitError {
  constructor(message: string, public filePath?: string) {
    super(message, MEDIA_ERROR_CODES.INTEGRITY_ERROR, { filePath });
    this.name = 'IntegrityError';
  }
}

export class ReserveError extends ShipkitError {
  constructor(message: string, public statusCode?: number) {
    super(message, MEDIA_ERROR_CODES.RESERVE_ERROR, { statusCode });
    this.name = 'ReserveError';
  }
}

export class CardinalityMismatchError extends ShipkitError {
  constructor(
    message: string,
    public localCount: number,
    public remoteCount: number
  ) {
    super(message, MEDIA_ERROR_CODES.CARDINALITY_MISMATCH, { localCount, remoteCount });
    this.name = 'CardinalityMismatchError';
  }
}

export class NotFoundError extends ShipkitError {
  constructor(message: string, public resource?: string) {
    super(message, MEDIA_ERROR_CODES.NOT_FOUND, { resource });
    this.name = 'NotFoundError';
  }
}

export function isRetryable(error: Error): boolean {
  return error instanceof TransportError && error.retryable;
}

/**
 * Stable code for summaries; unknown errors report as UNKNOWN
 */
export function errorCode(error: unknown): string {
  return error instanceof ShipkitError ? error.code : 'UNKNOWN';
}

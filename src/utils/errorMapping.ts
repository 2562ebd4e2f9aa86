import { DomainError, SpecError, ValidationError } from '../domain/shared/errors.js';
import type { MigrationStatus, MigrationStatusCode } from '../domain/migration/types.js';
import { logger } from './logger.js';

export interface ErrorDetails {
  code: string;
  message: string;
  details?: unknown;
  stack?: string;
}

export interface StatusMapping {
  status: Exclude<MigrationStatus, 'success'>;
  statusCode: Exclude<MigrationStatusCode, 200>;
}

/**
 * Authoring mistakes (an inconsistent or malformed spec) are 400s; anything the
 * database or the runtime raised is a 500.
 */
export function mapErrorToStatus(error: Error): StatusMapping {
  if (error instanceof SpecError || error instanceof ValidationError) {
    return { status: 'specError', statusCode: 400 };
  }

  if (!(error instanceof DomainError)) {
    logger.error({ err: error }, 'Unhandled error occurred');
  }

  return { status: 'executionError', statusCode: 500 };
}

export function createErrorDetails(error: Error): ErrorDetails {
  const isDev = process.env.NODE_ENV !== 'production';

  if (error instanceof DomainError) {
    return {
      ...error.toJSON(),
      ...(isDev && { stack: error.stack }),
    };
  }

  return {
    code: 'UNKNOWN_ERROR',
    message: error.message,
    ...(isDev && { stack: error.stack }),
  };
}

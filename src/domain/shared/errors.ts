export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly isOperational: boolean;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      isOperational: this.isOperational,
    };
  }
}

export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly isOperational = true;

  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      details: this.details,
    };
  }
}

/**
 * The schema spec cannot produce the requested step (missing install path,
 * upgrade step or bootstrap script).
 */
export class SpecError extends DomainError {
  readonly code = 'SPEC_ERROR';
  readonly isOperational = true;

  constructor(message: string) {
    super(`Error in spec: ${message}`);
  }
}

/**
 * The database rejected a statement, a bookkeeping read/write or a
 * transaction call. `targetVersion` is the version being transitioned to,
 * when a step was in flight.
 */
export class ExecutionError extends DomainError {
  readonly code: string = 'EXECUTION_ERROR';
  readonly isOperational = false;

  constructor(
    message: string,
    public readonly targetVersion?: number,
  ) {
    super(message);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      targetVersion: this.targetVersion,
    };
  }
}

export class VersionSkewError extends ExecutionError {
  readonly code: string = 'VERSION_SKEW';

  constructor(
    public readonly databaseVersion: number,
    public readonly latestVersion: number,
  ) {
    super(
      `Database schema version (${databaseVersion}) is newer than the spec's latest version ` +
        `(${latestVersion}), you probably need to upgrade the application first`,
    );
  }
}

export class InternalError extends DomainError {
  readonly code = 'INTERNAL_ERROR';
  readonly isOperational = false;

  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      cause: this.cause?.message,
    };
  }
}

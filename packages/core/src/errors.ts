/**
 * Shared recycler errors
 *
 * Every domain error extends RecyclerError so the API layer can map them to
 * HTTP status codes with a single instanceof check per kind.
 */

export class RecyclerError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends RecyclerError {
  constructor(message: string, options?: ErrorOptions) {
    super('VALIDATION_FAILED', message, options);
  }
}

export class AuthorizationError extends RecyclerError {
  constructor(actor: string, operation: string) {
    super('UNAUTHORIZED', `Actor "${actor}" is not allowed to ${operation}`);
  }
}

export class ReentrancyError extends RecyclerError {
  constructor(operation: string, activeOperation: string) {
    super(
      'REENTRANT_CALL',
      `Cannot start ${operation} while ${activeOperation} is in progress in the same context`
    );
  }
}

export function isRecyclerError(error: unknown): error is RecyclerError {
  return error instanceof RecyclerError;
}

/**
 * Best-effort message extraction for errors raised by collaborators
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

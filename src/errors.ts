/**
 * Error taxonomy shared by the core and the HTTP layer. Each error carries
 * the HTTP status and a machine-readable code the API returns as-is.
 */
export class AppError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'validation_error', details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code = 'not_found') {
    super(message, 404, code);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code = 'conflict') {
    super(message, 409, code);
  }
}

export class AlreadyAcknowledgedError extends ConflictError {
  constructor(alertId: string) {
    super(`Alert ${alertId} is already acknowledged`, 'already_acknowledged');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super(message, 401, 'unauthorized');
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super(message, 403, 'forbidden');
  }
}

export class CommandFailedError extends AppError {
  constructor(message: string) {
    super(message, 502, 'command_failed');
  }
}

export class RecordingFailedError extends AppError {
  constructor(message: string) {
    super(message, 502, 'recording_failed');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed input, rejected before any state is touched. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_FAILED', details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', details);
  }
}

/** The operation is not legal for the alert's current lifecycle state. */
export class InvalidStateError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_STATE', details);
  }
}

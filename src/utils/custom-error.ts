export class CustomError extends Error {
  public statusCode: number;
  public details?: unknown;

  constructor(message: string, statusCode: number = 500, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
    this.name = 'CustomError';
    Object.setPrototypeOf(this, CustomError.prototype);
  }
}

export class ValidationError extends CustomError {
  constructor(message: string, details?: unknown) {
    super(message, 400, details);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends CustomError {
  constructor(message: string = 'Resource not found') {
    super(message, 404);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ConflictError extends CustomError {
  constructor(message: string = 'Resource already exists') {
    super(message, 409);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

/**
 * A required input or state is missing: no target vehicle when an offer must be
 * built, no offer kinds requested, an inverted budget range, a session that is
 * not accepting rounds.
 */
export class PreconditionError extends CustomError {
  constructor(message: string, details?: unknown) {
    super(message, 422, details);
    this.name = 'PreconditionError';
    Object.setPrototypeOf(this, PreconditionError.prototype);
  }
}

/**
 * A write did not commit. `roundNumber` is set when the failure aborted a
 * negotiation round.
 */
export class PersistenceError extends CustomError {
  public roundNumber?: number;

  constructor(message: string, options: { roundNumber?: number; cause?: unknown } = {}) {
    super(message, 500, options.roundNumber !== undefined ? { roundNumber: options.roundNumber } : undefined);
    this.roundNumber = options.roundNumber;
    this.cause = options.cause;
    this.name = 'PersistenceError';
    Object.setPrototypeOf(this, PersistenceError.prototype);
  }
}

export default CustomError;

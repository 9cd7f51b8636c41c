export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    error: {
      code: string;
      message: string;
      details?: unknown;
    };
  } {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with identifier ${identifier} not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404);
  }
}

export class ConnectionError extends AppError {
  constructor(endpoint: string, message: string, details?: unknown) {
    super(`Connection to ${endpoint} failed: ${message}`, 'CONNECTION_ERROR', 503, details);
  }
}

export class OrderPlacementError extends AppError {
  constructor(
    public readonly side: 'UP' | 'DOWN',
    message: string,
    details?: unknown,
  ) {
    super(`Failed to place ${side} order: ${message}`, 'ORDER_PLACEMENT_ERROR', 502, details);
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_STATE', 409);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

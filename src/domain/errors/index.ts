
// Base class for domain errors - includes HTTP status for easy mapping
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// 410 Gone - session existed but went idle for too long
export class SessionExpiredError extends DomainError {
  constructor(sessionId: string) {
    super(
      `Session '${sessionId}' has expired. Please start a new session.`,
      'SESSION_EXPIRED',
      410
    );
  }
}

export class ResourceNotFoundError extends DomainError {
  constructor(resource: string, identifier: string | number) {
    super(
      `${resource} with identifier '${identifier}' not found.`,
      'RESOURCE_NOT_FOUND',
      404
    );
  }
}

// fields lists the offending request fields, when there are any
export class ValidationError extends DomainError {
  constructor(message: string, public readonly fields: string[] = []) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

export class EmptyCartError extends DomainError {
  constructor() {
    super('Your cart is empty.', 'EMPTY_CART', 400);
  }
}

// never says which of the identifier or password was wrong
export class AuthError extends DomainError {
  constructor() {
    super('Invalid credentials', 'AUTH_ERROR', 401);
  }
}

export class AuthenticationRequiredError extends DomainError {
  constructor() {
    super('You need to log in first.', 'AUTHENTICATION_REQUIRED', 401);
  }
}

export class ConflictError extends DomainError {
  constructor(message: string) {
    super(message, 'CONFLICT_ERROR', 409);
  }
}

/**
 * Typed failures raised by engine operations.
 *
 * Every engine rejection is one of these; the HTTP adapter turns
 * `code` and `status` into the response body and status line.
 */

export class DispatchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'DispatchError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Unknown request or worker id (404)
 */
export class NotFoundError extends DispatchError {
  constructor(resource: string, id: string) {
    super(`${resource} ${id} not found`, 'NOT_FOUND', 404, { resource, id });
    this.name = 'NotFoundError';
  }
}

/**
 * Actor lacks rights for this role/entity combination (403)
 */
export class ForbiddenError extends DispatchError {
  constructor(message: string) {
    super(message, 'FORBIDDEN', 403);
    this.name = 'ForbiddenError';
  }
}

/**
 * Current state does not permit the requested transition (409)
 */
export class InvalidTransitionError extends DispatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_TRANSITION', 409, details);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Lost the acceptance race: someone else already holds the request (409)
 */
export class AlreadyAssignedError extends DispatchError {
  constructor(requestId: string) {
    super(`Request ${requestId} has already been accepted`, 'ALREADY_ASSIGNED', 409, { requestId });
    this.name = 'AlreadyAssignedError';
  }
}

/**
 * Malformed input at the engine boundary (400)
 */
export class ValidationError extends DispatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * No usable caller identity on an inbound HTTP request (401)
 */
export class UnauthenticatedError extends DispatchError {
  constructor(message = 'Missing or invalid actor identity') {
    super(message, 'UNAUTHENTICATED', 401);
    this.name = 'UnauthenticatedError';
  }
}

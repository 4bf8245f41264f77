/**
 * Application error hierarchy.
 * Every failure a service can report is an AppError subclass carrying a
 * stable code, an HTTP status and optional structured details.
 * The error-handler middleware maps these to JSON responses.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super('UNAUTHORIZED', message, 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super('FORBIDDEN', message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFLICT', message, 409, details);
  }
}

/** A journey transition that the current stage does not allow. */
export class StateConflictError extends AppError {
  constructor(
    message: string,
    readonly currentStage: string,
    readonly reason: string = 'incompatible_stage'
  ) {
    super('STATE_CONFLICT', message, 409, { currentStage, reason });
  }
}

/** A non-terminal journey already exists for the pair. */
export class AlreadyExistsError extends AppError {
  constructor(readonly existingJourneyId: string) {
    super(
      'ALREADY_EXISTS',
      'An active journey already exists for this pair',
      409,
      { existingJourneyId }
    );
  }
}

export class NotEligibleError extends AppError {
  constructor(message: string, readonly reason: string) {
    super('NOT_ELIGIBLE', message, 422, { reason });
  }
}

export class DuplicateFeedbackError extends AppError {
  constructor(meetingRequestId: string) {
    super(
      'DUPLICATE_FEEDBACK',
      'Feedback has already been submitted for this meeting',
      409,
      { meetingRequestId }
    );
  }
}

export class InvalidMeetingStateError extends AppError {
  constructor(message: string, status: string) {
    super('INVALID_MEETING_STATE', message, 409, { status });
  }
}

export class RateLimitError extends AppError {
  constructor(retryAfter: number) {
    super('RATE_LIMITED', 'Too many requests', 429, { retryAfter });
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(maxBytes: number) {
    super('PAYLOAD_TOO_LARGE', `Request body exceeds ${maxBytes} bytes`, 413, { maxBytes });
  }
}

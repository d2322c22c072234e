/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In service
 * throw new JobNotFoundError(jobId);
 *
 * // In route handler
 * throw ValidationError.fromZodError(parsed.error);
 * ```
 *
 * A missing mesh for a route request is NOT an error: it is answered with a
 * normal FAILURE payload. Computation failures never surface as exceptions
 * either; they are recorded on the route.
 *
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * 400 Validation Error - Schema/input validation failed
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = [],
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, { errors });
    this.errors = errors;
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError('Validation failed', errors);
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode | string = ErrorCode.NOT_FOUND,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.NOT_FOUND, code, true, details);
  }
}

// =============================================================================
// DOMAIN-SPECIFIC ERRORS
// =============================================================================

export class JobNotFoundError extends NotFoundError {
  constructor(jobId: string) {
    super(`Job not found: ${jobId}`, ErrorCode.JOB_NOT_FOUND, { jobId });
  }
}

export class RouteNotFoundError extends NotFoundError {
  constructor(routeId: number) {
    super(`Route not found: ${routeId}`, ErrorCode.ROUTE_NOT_FOUND, { routeId });
  }
}

export class MeshNotFoundError extends NotFoundError {
  constructor(meshId: number) {
    super(`Mesh not found: ${meshId}`, ErrorCode.MESH_NOT_FOUND, { meshId });
  }
}

/**
 * Raised by a mesh import run that cannot proceed (e.g. no manifest on disk).
 * Propagates out of the ingestor to the scheduler.
 */
export class IngestionError extends AppError {
  constructor(
    message: string,
    code: ErrorCode | string = ErrorCode.MESH_INGESTION_FAILED,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.INTERNAL_ERROR, code, true, details);
  }
}

/**
 * Message of anything thrown, for logging and for persisting onto a route
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

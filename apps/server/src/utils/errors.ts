/**
 * Standardized error classes for Marquee
 * All errors return consistent ApiError format from @marquee/shared
 */

import type { FastifyInstance, FastifyError } from 'fastify';
import type { ZodError } from 'zod';
import type { ApiError } from '@marquee/shared';

// Error codes for client identification
export const ErrorCodes = {
  // Validation (2xxx)
  VALIDATION_ERROR: 'VAL_001',

  // Resource (3xxx)
  NOT_FOUND: 'RES_001',

  // External services (6xxx)
  EMBY_TIMEOUT: 'EXT_005',
  EMBY_UNAUTHORIZED: 'EXT_006',
  EMBY_UNREACHABLE: 'EXT_007',
  EMBY_MALFORMED: 'EXT_008',
  COMMAND_FAILED: 'EXT_009',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = true;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, AppError.prototype);
  }

  toJSON(): ApiError & { code: ErrorCode; details?: Record<string, unknown> } {
    return {
      statusCode: this.statusCode,
      error: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Validation error - 400 Bad Request
 */
export class ValidationError extends AppError {
  public readonly fields?: Array<{ field: string; message: string }>;

  constructor(message: string, fields?: Array<{ field: string; message: string }>) {
    super(message, 400, ErrorCodes.VALIDATION_ERROR, fields ? { fields } : undefined);
    this.name = 'ValidationError';
    this.fields = fields;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static fromZodError(error: ZodError, message = 'Validation failed'): ValidationError {
    const fields = error.issues.map((issue) => ({
      field: issue.path.map(String).join('.'),
      message: issue.message,
    }));
    return new ValidationError(message, fields);
  }
}

/**
 * Not found error - 404 Not Found
 */
export class NotFoundError extends AppError {
  constructor(resource = 'Resource', id?: string) {
    const message = id ? `${resource} with ID '${id}' not found` : `${resource} not found`;
    super(message, 404, ErrorCodes.NOT_FOUND);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

export type TransportErrorKind = 'timeout' | 'unauthorized' | 'unreachable' | 'malformed';

const TRANSPORT_CODES: Record<TransportErrorKind, ErrorCode> = {
  timeout: ErrorCodes.EMBY_TIMEOUT,
  unauthorized: ErrorCodes.EMBY_UNAUTHORIZED,
  unreachable: ErrorCodes.EMBY_UNREACHABLE,
  malformed: ErrorCodes.EMBY_MALFORMED,
};

/**
 * Failure talking to the Emby server.
 *
 * `unauthorized` is fatal to the polling category that hit it; the other
 * kinds are retried on the next cycle.
 */
export class TransportError extends AppError {
  public readonly kind: TransportErrorKind;
  public readonly url?: string;
  public readonly upstreamStatus?: number;

  constructor(
    kind: TransportErrorKind,
    message: string,
    options: { url?: string; upstreamStatus?: number; cause?: unknown } = {}
  ) {
    super(`Emby error: ${message}`, kind === 'timeout' ? 504 : 502, TRANSPORT_CODES[kind]);
    this.name = 'TransportError';
    this.kind = kind;
    this.url = options.url;
    this.upstreamStatus = options.upstreamStatus;
    if (options.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, TransportError.prototype);
  }

  get isFatal(): boolean {
    return this.kind === 'unauthorized';
  }
}

/**
 * A playback command the server refused or could not be reached for
 */
export class CommandError extends AppError {
  constructor(command: string, reason: string) {
    super(`Failed to send ${command}: ${reason}`, 502, ErrorCodes.COMMAND_FAILED, { command });
    this.name = 'CommandError';
    Object.setPrototypeOf(this, CommandError.prototype);
  }
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

/**
 * Response body for any thrown value. Only AppErrors carry a code; httpErrors
 * from @fastify/sensible keep their status; anything else is a 500 whose
 * message is hidden when `exposeInternal` is off.
 */
export function toApiError(
  error: FastifyError | Error,
  exposeInternal: boolean
): ApiError & { code?: ErrorCode } {
  if (error instanceof AppError) return error.toJSON();

  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return { statusCode: error.statusCode, error: error.name || 'Error', message: error.message };
  }

  return {
    statusCode: 500,
    error: 'InternalServerError',
    message: exposeInternal ? error.message : 'Internal server error',
  };
}

/**
 * Render every route error as an ApiError body. Upstream Emby failures log
 * at warn; only unexpected errors log at error.
 */
export function registerErrorHandler(app: FastifyInstance): void {
  const exposeInternal = process.env.NODE_ENV !== 'production';

  app.setErrorHandler((error: FastifyError | Error, request, reply) => {
    const body = toApiError(error, exposeInternal);
    const context = { err: error, method: request.method, url: request.url };

    if (isTransportError(error)) {
      request.log.warn({ ...context, kind: error.kind }, 'Emby request failed');
    } else if (body.statusCode >= 500) {
      request.log.error(context, 'Unhandled route error');
    } else {
      request.log.debug(context, 'Request rejected');
    }

    return reply.status(body.statusCode).send(body);
  });

  app.setNotFoundHandler((request, reply) => {
    const body: ApiError = {
      statusCode: 404,
      error: 'NotFound',
      message: `No route for ${request.method} ${request.url}`,
    };
    return reply.status(404).send(body);
  });
}

// ============================================
// DEADZONE - Error Handler Plugin
// ============================================

import { FastifyPluginAsync, FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { isDevelopment } from '../config/env.js';

// Custom error classes
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = 'INTERNAL_ERROR'
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(
      id ? `${resource} with ID '${id}' not found` : `${resource} not found`,
      404,
      'NOT_FOUND'
    );
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(message, 403, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code: string = 'CONFLICT') {
    super(message, 409, code);
    this.name = 'ConflictError';
  }
}

/**
 * The store was busy or locked. Safe to retry.
 */
export class TransientStoreError extends AppError {
  constructor(message: string = 'World store is busy, try again') {
    super(message, 503, 'STORE_BUSY');
    this.name = 'TransientStoreError';
  }
}

/**
 * Internal state broke one of the engine's rules. Never repaired automatically.
 */
export class InvariantViolation extends AppError {
  constructor(message: string) {
    super(message, 500, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolation';
  }
}

const TRANSIENT_SQLITE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_LOCKED_SHAREDCACHE']);

export function isTransientSqliteError(error: unknown): boolean {
  return error instanceof Error
    && 'code' in error
    && typeof error.code === 'string'
    && TRANSIENT_SQLITE_CODES.has(error.code);
}

/**
 * Map driver-level busy/locked failures to TransientStoreError, leave anything else alone.
 */
export function toStoreError(error: unknown): unknown {
  return isTransientSqliteError(error) ? new TransientStoreError() : error;
}

interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    stack?: string;
  };
}

export interface MappedError {
  statusCode: number;
  body: ErrorResponse;
}

/**
 * Shared by the HTTP error handler and the command dispatcher.
 */
export function toErrorResponse(error: unknown): MappedError {
  const response: ErrorResponse = {
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  };

  let statusCode = 500;
  const mapped = toStoreError(error);

  // Handle Zod validation errors
  if (mapped instanceof ZodError) {
    statusCode = 400;
    response.error.code = 'VALIDATION_ERROR';
    response.error.message = 'Validation failed';
    response.error.details = mapped.issues.map((e) => ({
      path: e.path.join('.'),
      message: e.message,
    }));
  }
  // Internal faults keep the generic message
  else if (mapped instanceof InvariantViolation) {
    response.error.code = mapped.code;
  }
  // Handle our custom errors
  else if (mapped instanceof AppError) {
    statusCode = mapped.statusCode;
    response.error.code = mapped.code;
    response.error.message = mapped.message;
    if (mapped instanceof ValidationError && mapped.details) {
      response.error.details = mapped.details;
    }
  }
  // Handle Fastify validation and client errors
  else if (isFastifyError(mapped) && mapped.statusCode !== undefined && mapped.statusCode < 500) {
    statusCode = mapped.statusCode;
    response.error.code = mapped.validation ? 'VALIDATION_ERROR' : mapped.code;
    response.error.message = mapped.message;
    if (mapped.validation) {
      response.error.details = mapped.validation;
    }
  }

  return { statusCode, body: response };
}

function isFastifyError(error: unknown): error is FastifyError {
  return error instanceof Error && 'code' in error && 'statusCode' in error;
}

export const errorHandlerPlugin: FastifyPluginAsync = async (fastify) => {
  // Global error handler
  fastify.setErrorHandler((error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) => {
    const { statusCode, body } = toErrorResponse(error);

    // Include stack trace in development
    if (isDevelopment() && error.stack && statusCode >= 500) {
      body.error.stack = error.stack;
    }

    const context = {
      err: error,
      request: {
        method: request.method,
        url: request.url,
        params: request.params,
      },
    };
    if (error instanceof InvariantViolation) {
      request.log.fatal(context, 'invariant violated');
    } else if (statusCode >= 500) {
      request.log.error(context);
    } else {
      request.log.warn({ code: body.error.code, url: request.url }, body.error.message);
    }

    reply.status(statusCode).send(body);
  });

  // 404 handler
  fastify.setNotFoundHandler((request, reply) => {
    reply.status(404).send({
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
      },
    });
  });
};

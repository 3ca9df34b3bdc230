/**
 * Global Error Handler
 * Provides consistent error responses across the API
 */

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import type { ApiError, FieldError, ValidationError } from '@sme-hunt/shared';
import { ZodError } from 'zod';
import { StoreUnavailableError, type AppError } from '../../lib/errors.js';
import { RETRY_MESSAGE } from '../../services/hunt/messages.js';

function isAppError(error: unknown): error is AppError {
  return error instanceof Error && ('statusCode' in error || 'code' in error);
}

function zodFieldErrors(error: ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || 'body',
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Global error handler for Fastify
 */
export function errorHandler(
  error: FastifyError | AppError | Error,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  const appError = isAppError(error) ? error : undefined;

  request.log.error(
    {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: appError?.code,
      },
      requestId: request.id,
    },
    'Request error'
  );

  if (error instanceof ZodError) {
    const body: ValidationError = {
      error: 'Validation Error',
      message: 'Request validation failed',
      code: 'VALIDATION_ERROR',
      validationErrors: zodFieldErrors(error),
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };
    reply.code(400).send(body);
    return;
  }

  const statusCode = appError?.statusCode || 500;

  // Store failures reach users as a plain "try again"
  const isProduction = process.env.NODE_ENV === 'production';
  let message = error.message || 'An error occurred';
  if (error instanceof StoreUnavailableError) {
    message = RETRY_MESSAGE;
  } else if (statusCode >= 500 && (isProduction || !appError)) {
    message = 'Internal server error';
  }

  const response: ApiError = {
    error: getErrorName(statusCode),
    message,
    code: appError?.code || getErrorCode(statusCode),
    requestId: request.id,
    timestamp: new Date().toISOString(),
  };

  if (appError?.details && !isProduction) {
    response.details = appError.details;
  }

  reply.code(statusCode).send(response);
}

/**
 * Not-found handler for unknown routes
 */
export function notFoundHandler(request: FastifyRequest, reply: FastifyReply): void {
  const response: ApiError = {
    error: 'Not Found',
    message: `Route ${request.method} ${request.url} not found`,
    code: 'NOT_FOUND',
    requestId: request.id,
    timestamp: new Date().toISOString(),
  };
  reply.code(404).send(response);
}

function getErrorName(statusCode: number): string {
  const names: Record<number, string> = {
    400: 'Bad Request',
    404: 'Not Found',
    409: 'Conflict',
    500: 'Internal Server Error',
    503: 'Service Unavailable',
  };
  return names[statusCode] || 'Error';
}

function getErrorCode(statusCode: number): string {
  const codes: Record<number, string> = {
    400: 'BAD_REQUEST',
    404: 'NOT_FOUND',
    409: 'CONFLICT',
    500: 'INTERNAL_ERROR',
    503: 'SERVICE_UNAVAILABLE',
  };
  return codes[statusCode] || 'UNKNOWN_ERROR';
}

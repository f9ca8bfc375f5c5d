import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { AppError, InvalidInputError, ValidationError } from '../../shared/errors.js';
import { getLogger } from '../../shared/logger.js';

const logger = getLogger('server', { component: 'error-handler' });

interface ErrorResponseBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
    stack?: string;
  };
}

/**
 * AppErrors carry their own status code; Fastify's own errors (malformed
 * JSON, oversized body) carry theirs as `statusCode`. Anything else is 500.
 */
function resolveStatusCode(error: unknown): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }

  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    const code = error.statusCode;
    if (typeof code === 'number' && code >= 400 && code < 600) {
      return code;
    }
  }

  return 500;
}

function resolveErrorCode(error: unknown): string {
  if (error instanceof AppError) {
    return error.code;
  }

  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    if (typeof code === 'string') {
      return code;
    }
  }

  return 'INTERNAL_ERROR';
}

/**
 * In production, internal errors get a generic message so implementation
 * details never reach the client.
 */
function resolveMessage(error: unknown, statusCode: number): string {
  if (error instanceof AppError) {
    return error.message;
  }

  if (error instanceof Error) {
    if (statusCode >= 500 && process.env['NODE_ENV'] === 'production') {
      return 'An unexpected error occurred';
    }
    return error.message;
  }

  return 'An unexpected error occurred';
}

function resolveDetails(error: FastifyError | Error): unknown {
  if ('validation' in error && error.validation) {
    return error.validation;
  }
  if (error instanceof ValidationError) {
    return { field: error.field };
  }
  if (error instanceof InvalidInputError) {
    return { path: error.path };
  }
  return undefined;
}

/**
 * Global Fastify error handler. Registered as `app.setErrorHandler()`.
 * Every error leaves as `{ error: { code, message, details? } }`.
 */
export function globalErrorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply,
): void {
  const statusCode = resolveStatusCode(error);
  const code = resolveErrorCode(error);
  const message = resolveMessage(error, statusCode);

  const logContext = {
    err: error,
    statusCode,
    code,
    requestId: request.id,
    method: request.method,
    url: request.url,
  };

  if (statusCode >= 500) {
    logger.error(logContext, `Server error: ${message}`);
  } else {
    logger.warn(logContext, `Client error: ${message}`);
  }

  const body: ErrorResponseBody = {
    error: {
      code,
      message,
    },
  };

  if (statusCode === 400 || statusCode === 422) {
    const details = resolveDetails(error);
    if (details !== undefined) {
      body.error.details = details;
    }
  }

  if (process.env['NODE_ENV'] === 'development' && statusCode >= 500 && error.stack) {
    body.error.stack = error.stack;
  }

  void reply.status(statusCode).send(body);
}

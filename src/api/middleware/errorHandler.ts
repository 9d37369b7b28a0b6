/**
 * Error Handler Middleware
 *
 * Centralized error handling for the API.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ConfigurationError } from '../../core/errors.js';

// =============================================================================
// ERROR TYPES
// =============================================================================

export class ApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string, id?: string) {
    super(
      id ? `${resource} not found: ${id}` : `${resource} not found`,
      404,
      'NOT_FOUND',
      { resource, id }
    );
  }
}

// =============================================================================
// ERROR RESPONSE TYPE
// =============================================================================

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    details?: Record<string, unknown>;
    requestId?: string;
  };
}

function requestIdOf(req: Request): string | undefined {
  const header = req.headers['x-request-id'];
  return Array.isArray(header) ? header[0] : header;
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = requestIdOf(req);

  // Handle known error types
  if (err instanceof ApiError) {
    res.status(err.statusCode).json({
      error: {
        message: err.message,
        code: err.code,
        details: err.details,
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  // Request body validation
  if (err instanceof ZodError) {
    res.status(422).json({
      error: {
        message: 'Validation error',
        code: 'VALIDATION_ERROR',
        details: {
          errors: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        },
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  // Malformed JSON bodies are rejected by express.json() before any route runs
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({
      error: {
        message: 'Malformed JSON body',
        code: 'BAD_REQUEST',
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  console.error('[API] Error:', {
    name: err.name,
    message: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  if (err instanceof ConfigurationError) {
    res.status(500).json({
      error: {
        message: err.message,
        code: err.code,
        details: err.details,
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  // Default to internal server error
  res.status(500).json({
    error: {
      message:
        process.env.NODE_ENV === 'production'
          ? 'Internal server error'
          : err.message,
      code: 'INTERNAL_ERROR',
      requestId,
    },
  } satisfies ErrorResponse);
}

// =============================================================================
// NOT FOUND HANDLER
// =============================================================================

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      message: `Route not found: ${req.method} ${req.path}`,
      code: 'ROUTE_NOT_FOUND',
      requestId: requestIdOf(req),
    },
  } satisfies ErrorResponse);
}

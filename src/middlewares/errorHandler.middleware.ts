import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { buildErrorResponse } from '../services/responseBuilder';
import { ApiError, ValidationError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { zodIssues } from './validation.middleware';

const requestParamsOf = (req: Request): Record<string, unknown> => {
  const body: unknown = req.body;
  return typeof body === 'object' && body !== null && !Array.isArray(body) ? { ...body } : {};
};

/**
 * 🌐 Centralized error-handling middleware.
 * Every error leaves the API in the scrape response envelope.
 */
export const errorHandler: ErrorRequestHandler = (
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
) => {
  const isDevelopment = process.env.NODE_ENV === 'development';
  const now = new Date();
  const params = requestParamsOf(req);

  /** 1️⃣ Zod errors raised inside handlers */
  if (error instanceof ZodError) {
    logger.warn(`🧾 Validation failed on ${req.method} ${req.originalUrl}`);
    res.status(400).json(buildErrorResponse(zodIssues(error), params, now));
    return;
  }

  /** 2️⃣ Request validation errors */
  if (error instanceof ValidationError) {
    const details = error.issues.length > 0 ? error.issues.join('; ') : null;
    res.status(400).json(buildErrorResponse([{ code: error.code, message: error.message, details }], params, now));
    return;
  }

  /** 3️⃣ Custom API errors (operational) */
  if (error instanceof ApiError) {
    const log = error.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`❌ ${error.name}: ${error.message}`, { path: req.originalUrl, method: req.method });
    res.status(error.statusCode).json({
      ...buildErrorResponse([{ code: error.code, message: error.message, details: null }], params, now),
      ...(isDevelopment && { stack: error.stack }),
    });
    return;
  }

  /** 4️⃣ Malformed JSON bodies from express.json() */
  if (error instanceof SyntaxError && 'body' in error) {
    res
      .status(400)
      .json(buildErrorResponse([{ code: 'INVALID_PARAMS', message: 'Malformed JSON body', details: null }], {}, now));
    return;
  }

  /** 5️⃣ Fallback: unhandled errors */
  logger.error(`❌ Unhandled error: ${errorMessage(error)}`, {
    stack: error instanceof Error ? error.stack : undefined,
    path: req.originalUrl,
    method: req.method,
  });
  res.status(500).json(
    buildErrorResponse(
      [
        {
          code: 'INTERNAL_ERROR',
          message: 'Internal server error',
          details: isDevelopment ? errorMessage(error) : null,
        },
      ],
      params,
      now,
    ),
  );
};

/**
 * 🧭 404 for routes that do not exist.
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  res
    .status(404)
    .json(
      buildErrorResponse(
        [{ code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found`, details: null }],
        {},
        new Date(),
      ),
    );
};

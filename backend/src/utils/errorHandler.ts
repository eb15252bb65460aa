import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { ApiError } from './apiError';
import { ValidationError } from './errors';
import { logger } from './logger';

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ApiError) {
    logger.error(
      {
        status: err.status,
        message: err.message,
        stack: err.stack,
      },
      'API Error',
    );
    res.status(err.status).json({
      error: err.message,
      message: err.message,
    });
    return;
  }

  if (err instanceof ZodError) {
    logger.warn({ issues: err.issues }, 'Request validation failed');
    res.status(400).json({
      error: 'Invalid request',
      details: err.issues,
    });
    return;
  }

  if (err instanceof ValidationError) {
    logger.warn({ message: err.message, details: err.details }, 'Contract violation');
    res.status(422).json({
      error: err.message,
      details: err.details,
    });
    return;
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error(
    {
      error: error.message,
      stack: error.stack,
      name: error.name,
    },
    'Unhandled error',
  );

  const isDevelopment = process.env.NODE_ENV !== 'production';
  res.status(500).json({
    error: 'Internal server error',
    message: isDevelopment ? error.message : undefined,
    stack: isDevelopment ? error.stack : undefined,
  });
};

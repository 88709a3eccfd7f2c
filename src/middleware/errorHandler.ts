import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { isEngineError } from '@/utils/errors';
import { logger } from '@/utils/logger';

interface ErrorBody {
  statusCode: number;
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

const toErrorBody = (err: unknown): ErrorBody => {
  if (isEngineError(err)) {
    return { statusCode: err.statusCode, code: err.code, message: err.message, details: err.details };
  }

  // Request validation that did not go through a controller schema
  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      message: err.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    };
  }

  // express.json() on an unparseable body
  if (err instanceof SyntaxError && 'body' in err) {
    return { statusCode: 400, code: 'MALFORMED_REQUEST', message: 'Request body is not valid JSON' };
  }

  return { statusCode: 500, code: 'SERVER_ERROR', message: 'Server Error' };
};

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const error = toErrorBody(err);

  if (error.statusCode >= 500) {
    logger.error(`${req.method} ${req.originalUrl} failed`, {
      code: error.code,
      error: err instanceof Error ? err.message : String(err),
    });
  }

  res.status(error.statusCode).json({
    success: false,
    error: {
      code: error.code,
      message: error.message,
      ...(error.details ? { details: error.details } : {}),
    },
  });
};

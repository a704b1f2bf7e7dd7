import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { errorMessage, isPipelineError, isSessionMisuseError } from '../errors/PipelineError';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'ErrorHandler' });

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (isSessionMisuseError(err)) {
    logger.info({ kind: err.kind, path: req.path }, err.message);
    res.status(409).json({ error: err.kind, message: err.message });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'ValidationError',
      issues: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    });
    return;
  }

  logger.error(
    {
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
      path: req.path,
      method: req.method
    },
    'Unhandled error'
  );

  res.status(500).json({
    error: isPipelineError(err) ? err.kind : 'InternalError',
    message: errorMessage(err)
  });
}

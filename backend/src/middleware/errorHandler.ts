import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { ServiceError } from '../services/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('http');

/** Error raised by a route for a bad request; carries the status to answer with. */
export class HttpError extends Error {
  constructor(message: string, readonly statusCode: number, readonly code: string) {
    super(message);
    this.name = 'HttpError';
  }
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof MulterError) {
    log.warn(`${req.method} ${req.path}: upload rejected (${err.code})`);
    res.status(400).json({
      error: err.code === 'LIMIT_FILE_SIZE' ? 'File too large' : `File upload failed: ${err.message}`,
      code: err.code,
    });
    return;
  }

  if (err instanceof ServiceError || err instanceof HttpError) {
    log.warn(`${req.method} ${req.path}: ${err.message}`);
    res.status(err.statusCode).json({ error: err.message, code: err.code });
    return;
  }

  log.error(`${req.method} ${req.path}: ${err.message}`, {
    stack: err.stack?.split('\n').slice(0, 5).join('\n'),
  });
  res.status(500).json({
    error: 'Internal server error',
    code: 'INTERNAL_SERVER_ERROR',
    details: process.env.NODE_ENV === 'production' ? undefined : err.message,
  });
}

import { Request, Response, NextFunction } from 'express';
import { createLogger } from '../utils/logger';

const log = createLogger('request');

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    log.debug(`${req.method} ${req.path} ${res.statusCode} ${Date.now() - start}ms`);
  });

  next();
}

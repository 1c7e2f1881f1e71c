import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { logger } from '../../config/logger';
import { HttpError } from '../../services/whisper/errors';

export function notFound(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}

/** Last middleware: upload limit errors and anything a handler passed to next(). */
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof multer.MulterError) {
    const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    res.status(status).json({ error: err.message, code: err.code, field: err.field });
    return;
  }
  if (err instanceof HttpError) {
    logger.error('Request failed', { status: err.status, ...err.body });
    res.status(err.status).json(err.body);
    return;
  }
  logger.error('Unhandled request error', err);
  res.status(500).json({ error: 'Internal server error' });
}

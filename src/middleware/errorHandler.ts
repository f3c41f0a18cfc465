import { NextFunction, Request, Response } from 'express';
import { AppError } from '../errors';
import { safeLogger } from '../security/safeLogger';

const STATUS_BY_CODE: Record<string, number> = {
  UNKNOWN_INSTRUMENT: 404,
  MISSING_QUESTIONS: 400,
  UNEXPECTED_QUESTIONS: 400,
  INVALID_SUBMISSION: 400,
  USER_NOT_FOUND: 404,
  NO_RESULTS: 404,
  DUPLICATE_USER: 409,
};

function isParseFailure(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function notFound(req: Request, res: Response) {
  res.status(404).json({ error: 'NOT_FOUND', message: `Not found: ${req.path}` });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (isParseFailure(err)) {
    return res.status(400).json({ error: 'INVALID_JSON', message: 'Request body is not valid JSON' });
  }

  if (err instanceof AppError) {
    const status = STATUS_BY_CODE[err.code] ?? 500;
    if (status >= 500) {
      safeLogger.error('request.failed', { method: req.method, path: req.path, code: err.code, message: err.message });
    }
    return res.status(status).json({ error: err.code, message: err.message, ...err.details() });
  }

  safeLogger.error('request.failed', {
    method: req.method,
    path: req.path,
    message: err instanceof Error ? err.message : String(err),
  });
  return res.status(500).json({ error: 'INTERNAL_ERROR', message: 'Internal Server Error' });
}

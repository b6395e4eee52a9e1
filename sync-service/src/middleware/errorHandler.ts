import type { NextFunction, Request, Response } from 'express';

import { AppError, getErrorMessage } from '../errors/index.js';
import { logError } from '../utils/logger.js';

const NOT_FOUND_CODES = new Set(['note_not_found', 'vault_not_found']);

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  // Body parser invalid JSON
  if (err instanceof SyntaxError && 'body' in err) {
    return res.status(400).json({ ok: false, error: 'invalid json' });
  }
  if (err instanceof AppError && NOT_FOUND_CODES.has(err.code)) {
    return res.status(404).json({ ok: false, error: err.message });
  }

  const msg = getErrorMessage(err);
  logError('unhandled error', {
    method: req.method,
    url: req.originalUrl || req.url,
    code: err instanceof AppError ? err.code : undefined,
    message: msg,
  });
  return res.status(500).json({ ok: false, error: msg });
}

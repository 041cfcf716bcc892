import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { StationError, ValidationError } from '@weather-station/domain';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof StationError) {
    if (err.status >= 500) {
      console.error(`[api] ${err.code}`, err);
    }
    res.status(err.status).json({
      error: err.code,
      message: err.message,
      ...(err.source ? { source: err.source } : {}),
      ...(err instanceof ValidationError ? { details: err.issues } : {}),
    });
    return;
  }
  console.error('[api] unhandled error', err);
  res.status(500).json({ error: 'Internal server error' });
}

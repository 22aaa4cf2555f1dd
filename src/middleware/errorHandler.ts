import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';

import { ConverterError, toErrorResponse } from '../errors';

/**
 * Logs server-side failures, together with the engine output carried as
 * `detail` when there is one. Client errors (4xx) are not logged.
 */
export function logFailure(prefix: string, statusCode: number, error: unknown): void {
  if (statusCode < 500) {
    return;
  }

  const { body } = toErrorResponse(error);
  // eslint-disable-next-line no-console
  console.error(`${prefix}: ${body.error}`);

  if (error instanceof ConverterError && error.detail) {
    // eslint-disable-next-line no-console
    console.error(error.detail);
  }
}

export function sendError(res: Response, error: unknown): Response {
  const { statusCode, body } = toErrorResponse(error);
  logFailure('Request failed', statusCode, error);
  return res.status(statusCode).json(body);
}

export function errorHandler(error: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof multer.MulterError) {
    res.status(400).json({ error: error.message, code: 'InvalidRequest' });
    return;
  }

  sendError(res, error);
}

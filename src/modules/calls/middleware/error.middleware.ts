/**
 * HTTP error responses
 */

import type { NextFunction, Request, Response } from 'express';
import { logger } from '@/shared/utils';

export enum HttpErrorCode {
  INVALID_REQUEST = 'INVALID_REQUEST',
  SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
  NOT_FOUND = 'NOT_FOUND',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface HttpErrorBody {
  error: {
    code: HttpErrorCode;
    message: string;
    issues?: unknown[];
  };
}

export function sendError(
  res: Response,
  status: number,
  code: HttpErrorCode,
  message: string,
  issues?: unknown[]
): void {
  const body: HttpErrorBody = { error: { code, message, ...(issues ? { issues } : {}) } };
  res.status(status).json(body);
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function notFoundHandler(req: Request, res: Response): void {
  sendError(res, 404, HttpErrorCode.NOT_FOUND, `No route for ${req.method} ${req.path}`);
}

/**
 * Final Express error handler. Body-parser failures keep their 4xx status.
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = statusOf(error);

  if (status !== undefined && status >= 400 && status < 500) {
    logger.warn('Rejected malformed request', { method: req.method, path: req.path, status });
    sendError(res, status, HttpErrorCode.INVALID_REQUEST, 'Malformed request body');
    return;
  }

  logger.error('Unhandled HTTP error', error);
  if (res.headersSent) {
    return;
  }
  sendError(res, 500, HttpErrorCode.INTERNAL_ERROR, 'Internal server error');
}

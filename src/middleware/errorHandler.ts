import { HttpStatus } from '../config';

import type { ErrorRequestHandler } from 'express';

/**
 * Status carried by an error the body parser raised (400 malformed JSON,
 * 413 oversized body), if any.
 */
export function getClientErrorStatus(error: unknown): number | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return error.status;
  }
  return undefined;
}

/**
 * Last handler in the chain: JSON errors instead of express's HTML page.
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const message = error instanceof Error ? error.message : 'An error occurred';
  const clientStatus = getClientErrorStatus(error);
  if (clientStatus !== undefined) {
    req.log.warn('Rejected request body', { error: message, statusCode: clientStatus });
    res.status(clientStatus).json({ error: 'Invalid request body', message });
    return;
  }

  req.log.error('Unhandled error', error);
  res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({ error: 'Failed to process request', message });
};

import { randomUUID } from 'node:crypto';

import { AuthConfig } from '../config';
import { debugRequest } from '../utils/debugLogger';
import { logger } from '../utils/logger';

import type { LogContext, Logger } from '../utils/logger';
import type { NextFunction, Request, Response } from 'express';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      correlationId: string;
      log: Logger;
      startTime: number;
    }
  }
}

export function generateCorrelationId(): string {
  return `req-${Date.now().toString(36)}-${randomUUID().slice(0, 8)}`;
}

/**
 * Mask an API token for logging: the prefix and the last four characters.
 */
export function maskToken(value: string): string {
  if (value.startsWith(AuthConfig.tokenPrefix) && value.length > AuthConfig.tokenPrefix.length + 4) {
    return `${AuthConfig.tokenPrefix}****${value.slice(-4)}`;
  }
  return '****';
}

function getSafeHeaders(req: Request): LogContext {
  const headers: LogContext = {};
  const { 'content-length': contentLength, 'content-type': contentType, 'user-agent': userAgent } =
    req.headers;
  if (contentType) headers.contentType = contentType;
  if (contentLength) headers.contentLength = contentLength;
  if (userAgent) headers.userAgent = userAgent;

  const apiKey = req.headers[AuthConfig.headerName];
  if (typeof apiKey === 'string') {
    headers.hasApiKey = true;
    headers.apiKeyPrefix = maskToken(apiKey);
  }
  return headers;
}

/**
 * Attach a correlation-scoped logger to the request and log it on the way
 * in and on the way out.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  req.correlationId = generateCorrelationId();
  req.startTime = Date.now();
  req.log = logger.child(req.correlationId);

  req.log.info('Incoming request', {
    headers: getSafeHeaders(req),
    ip: req.ip,
    method: req.method,
    path: req.path,
    query: Object.keys(req.query).length > 0 ? req.query : undefined,
  });

  res.on('finish', () => {
    const { statusCode } = res;
    const context = {
      durationMs: Date.now() - req.startTime,
      method: req.method,
      path: req.path,
      statusCode,
    };
    if (statusCode >= 500) {
      req.log.error('Request completed', undefined, context);
    } else if (statusCode >= 400) {
      req.log.warn('Request completed', context);
    } else {
      req.log.info('Request completed', context);
    }
  });

  next();
}

/**
 * Log the parsed body under DEBUG_LOGGING. Runs after the JSON parser.
 */
export function requestBodyLogger(req: Request, _res: Response, next: NextFunction): void {
  debugRequest(req.log, req.body, { path: req.path });
  next();
}

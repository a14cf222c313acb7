/**
 * In-memory, fixed-window rate limiting per client IP.
 * Each limiter keeps its own counters, so it only covers a single process.
 */

import { HttpStatus, RateLimitConfig } from '../config';

import type { JsonResponse, MiddlewareRequest } from '../types';
import type { NextFunction } from 'express';

export interface RateLimitOptions {
  /** Maximum number of requests allowed in the time window */
  maxRequests: number;
  /** Paths that are never limited, e.g. health checks */
  skipPaths: readonly string[];
  /** Time window in milliseconds */
  windowMs: number;
  now?: () => number;
}

interface RequestWindow {
  count: number;
  resetTime: number;
}

/**
 * Client IP, honouring the common proxy headers.
 */
export function getClientIp(req: MiddlewareRequest): string {
  const forwardedFor = req.headers['x-forwarded-for'];
  const firstForwarded = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
  if (firstForwarded) {
    // X-Forwarded-For can be a comma-separated chain; the client comes first
    return firstForwarded.split(',')[0].trim();
  }

  const realIp = req.headers['x-real-ip'];
  const firstReal = Array.isArray(realIp) ? realIp[0] : realIp;
  if (firstReal) return firstReal;

  return req.ip ?? 'unknown';
}

export function createRateLimit(options: Partial<RateLimitOptions> = {}) {
  const settings: RateLimitOptions = {
    maxRequests: RateLimitConfig.maxRequests,
    skipPaths: RateLimitConfig.skipPaths,
    windowMs: RateLimitConfig.windowMs,
    ...options,
  };
  const now = settings.now ?? Date.now;
  const windows = new Map<string, RequestWindow>();

  const cleanup = setInterval(() => {
    const current = now();
    for (const [clientIp, window] of windows) {
      if (window.resetTime <= current) windows.delete(clientIp);
    }
  }, settings.windowMs * 2);
  cleanup.unref();

  return (req: MiddlewareRequest, res: JsonResponse, next: NextFunction): void => {
    if (settings.skipPaths.includes(req.path)) {
      next();
      return;
    }

    const clientIp = getClientIp(req);
    const current = now();
    let window = windows.get(clientIp);
    if (!window || window.resetTime <= current) {
      window = { count: 0, resetTime: current + settings.windowMs };
      windows.set(clientIp, window);
    }
    window.count++;

    const remaining = Math.max(0, settings.maxRequests - window.count);
    const resetSeconds = Math.ceil((window.resetTime - current) / 1000);
    res.setHeader('X-RateLimit-Limit', String(settings.maxRequests));
    res.setHeader('X-RateLimit-Remaining', String(remaining));
    res.setHeader('X-RateLimit-Reset', String(resetSeconds));

    if (window.count > settings.maxRequests) {
      req.log.warn('Rate limit exceeded', {
        clientIp,
        limit: settings.maxRequests,
        path: req.path,
        requests: window.count,
        resetIn: resetSeconds,
      });
      res.setHeader('Retry-After', String(resetSeconds));
      res.status(HttpStatus.TOO_MANY_REQUESTS).json({
        error: 'Too many requests',
        message: `Rate limit exceeded. Try again in ${String(resetSeconds)} seconds.`,
        retryAfter: resetSeconds,
      });
      return;
    }

    next();
  };
}

import { timingSafeEqual } from 'node:crypto';

import { AuthConfig, HttpStatus } from '../config';

import type { JsonResponse, MiddlewareRequest } from '../types';
import type { NextFunction } from 'express';

/**
 * Determine the reason for auth failure (for logging purposes only).
 */
function getAuthFailureReason(token: string | undefined): string {
  if (!token) return 'missing_token';
  if (!token.startsWith(AuthConfig.tokenPrefix)) return 'invalid_format';
  return 'token_mismatch';
}

/**
 * Timing-safe token comparison to prevent timing attacks.
 */
function isValidToken(provided: string, expected: string): boolean {
  if (provided.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(Buffer.from(provided), Buffer.from(expected));
}

function readToken(req: MiddlewareRequest): string | undefined {
  const header = req.headers[AuthConfig.headerName];
  return typeof header === 'string' ? header : undefined;
}

/**
 * Fail fast at startup when the API token is missing or malformed.
 *
 * @throws Error naming the environment variable
 */
export function validateApiToken(value: string | undefined): void {
  if (!value) {
    throw new Error(`${AuthConfig.tokenEnvVar} environment variable is required`);
  }
  if (!value.startsWith(AuthConfig.tokenPrefix)) {
    throw new Error(`${AuthConfig.tokenEnvVar} must start with "${AuthConfig.tokenPrefix}"`);
  }
}

/**
 * Authentication middleware for every /api route.
 */
export function requireApiAuth(req: MiddlewareRequest, res: JsonResponse, next: NextFunction): void {
  const token = readToken(req);
  const expected = process.env[AuthConfig.tokenEnvVar] ?? '';

  if (!token || !token.startsWith(AuthConfig.tokenPrefix) || !isValidToken(token, expected)) {
    req.log.warn('API authentication failed', {
      path: req.path,
      reason: getAuthFailureReason(token),
    });
    res.status(HttpStatus.UNAUTHORIZED).json({ error: 'Unauthorized: Invalid API token' });
    return;
  }

  req.log.debug('API authentication successful');
  next();
}

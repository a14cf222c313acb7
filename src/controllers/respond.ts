/**
 * Shared plumbing for the JSON handlers: input validation, mapping of
 * mutation results to statuses, and the catch-all for unexpected errors.
 */

import { HttpStatus } from '../config';
import { debugValidation } from '../utils/debugLogger';

import type { MutationFailureReason, MutationResult } from '../sessions/results';
import type { ApiHandler, ApiRequest, JsonResponse } from '../types';
import type { z } from 'zod';

const FAILURE_STATUS: Record<MutationFailureReason, number> = {
  capacity: HttpStatus.CONFLICT,
  completed: HttpStatus.CONFLICT,
  empty: HttpStatus.CONFLICT,
  inactive: HttpStatus.CONFLICT,
  invalid: HttpStatus.UNPROCESSABLE_ENTITY,
  notFound: HttpStatus.NOT_FOUND,
};

export function statusForFailure(reason: MutationFailureReason): number {
  return FAILURE_STATUS[reason];
}

/**
 * Validate part of a request. On failure the 400 response has been sent
 * and undefined comes back.
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  req: ApiRequest,
  res: JsonResponse,
): undefined | z.output<S> {
  const result = schema.safeParse(input);
  debugValidation(req.log, result.success, input, result.success ? undefined : result.error.issues);
  if (result.success) return result.data;

  req.log.warn('Invalid request', { errors: result.error.issues });
  res.status(HttpStatus.BAD_REQUEST).json({
    details: result.error.issues,
    error: 'Invalid request format',
  });
  return undefined;
}

export function sendFailure(
  res: JsonResponse,
  failure: { message: string; reason: MutationFailureReason },
): void {
  res.status(statusForFailure(failure.reason)).json({
    error: failure.reason,
    message: failure.message,
  });
}

/**
 * Send the value of a successful mutation, or the mapped failure status.
 */
export function sendResult<T>(
  res: JsonResponse,
  result: MutationResult<T>,
  successStatus: number = HttpStatus.OK,
): void {
  if (!result.ok) {
    sendFailure(res, result);
    return;
  }
  res.status(successStatus).json(result.value);
}

/**
 * Wrap a handler with timing and a 500 response for anything it throws.
 */
export function handle(operation: string, handler: ApiHandler): ApiHandler {
  return async (req, res) => {
    const timer = req.log.startTimer(operation);
    try {
      await handler(req, res);
      timer.end('debug', `${operation} handled`);
    } catch (error) {
      timer.end('error', `${operation} failed`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      // Already answered, e.g. by the request timeout
      if (res.headersSent) return;
      res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
        error: 'Failed to process request',
        message: error instanceof Error ? error.message : 'An error occurred',
      });
    }
  };
}

import { HttpStatus, RequestConfig } from '../config';

import type { JsonResponse, MiddlewareRequest } from '../types';

interface TimedRequest extends MiddlewareRequest {
  method: string;
  socket: { setTimeout(timeoutMs: number): unknown };
}

interface TimedResponse extends JsonResponse {
  once(event: 'close' | 'finish', listener: () => void): unknown;
}

/**
 * Answer 408 when a request is still unanswered after `timeoutMs`.
 * A handler that finishes later finds the headers sent and only logs.
 */
export function createRequestTimeout(
  timeoutMs: number = RequestConfig.timeoutMs,
): (req: TimedRequest, res: TimedResponse, next: () => void) => void {
  const limitSeconds = timeoutMs / 1000;

  return (req, res, next) => {
    req.socket.setTimeout(timeoutMs);

    const timer = setTimeout(() => {
      if (res.headersSent) return;
      req.log.warn('Request exceeded the processing limit', {
        method: req.method,
        path: req.path,
        timeoutMs,
      });
      res.status(HttpStatus.REQUEST_TIMEOUT).json({
        error: 'Request timeout',
        message: `Request processing exceeded ${String(limitSeconds)} seconds`,
      });
    }, timeoutMs);

    const clear = () => {
      clearTimeout(timer);
    };
    res.once('finish', clear);
    res.once('close', clear);

    next();
  };
}

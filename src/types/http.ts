/**
 * The parts of an express request and response the handlers touch.
 * Express's own objects satisfy these, and so do test stubs.
 */

import type { IncomingHttpHeaders } from 'node:http';

import type { Logger } from '../utils/logger';

export interface ApiRequest {
  body: unknown;
  log: Logger;
  params: Record<string, string>;
  query: Record<string, unknown>;
}

export interface MiddlewareRequest {
  headers: IncomingHttpHeaders;
  log: Logger;
  path: string;
  ip?: string;
}

export interface JsonResponse {
  readonly headersSent: boolean;
  json(body: unknown): unknown;
  setHeader(name: string, value: string): unknown;
  status(code: number): JsonResponse;
}

export type ApiHandler = (req: ApiRequest, res: JsonResponse) => Promise<void>;

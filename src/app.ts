import cors from 'cors';
import express from 'express';

import { CorsConfig, HttpStatus, ServerConfig } from './config';
import { requireApiAuth } from './middleware/auth';
import { errorHandler } from './middleware/errorHandler';
import { createRateLimit } from './middleware/rateLimit';
import { requestBodyLogger, requestLogger } from './middleware/requestLogger';
import { createRequestTimeout } from './middleware/requestTimeout';
import { createApiRouter } from './routes';

import type { ApiRouterOptions } from './routes';

export type AppOptions = ApiRouterOptions;

/**
 * CORS origins from CORS_ORIGINS (comma-separated). Unset or "*" allows any.
 */
export function resolveCorsOrigin(value: string | undefined): string | string[] {
  if (!value || value.trim() === '*') return '*';
  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

export function createApp(options: AppOptions): express.Express {
  const app = express();
  app.disable('x-powered-by'); // Prevent version disclosure

  // eslint-disable-next-line sonarjs/cors -- origins come from CORS_ORIGINS
  app.use(
    cors({
      allowedHeaders: [...CorsConfig.allowedHeaders],
      methods: [...CorsConfig.allowedMethods],
      origin: resolveCorsOrigin(process.env[CorsConfig.originsEnvVar]),
    }),
  );

  // Request logging first: everything after it logs through req.log
  app.use(requestLogger);
  app.use(createRateLimit());
  app.use(createRequestTimeout());
  app.use(express.json({ limit: ServerConfig.bodyLimit }));
  app.use(requestBodyLogger);

  app.get('/health', (_req: express.Request, res: express.Response) => {
    res.status(HttpStatus.OK).send('OK');
  });

  app.use('/api', requireApiAuth, createApiRouter(options));
  app.use(errorHandler);

  return app;
}

import express, { Router, json } from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { pinoHttp } from 'pino-http';
import { createClassifyController } from './controller.js';
import type { ClassifyControllerDeps } from './controller.js';
import { responseLogLevel } from './logger.js';

export interface ClassifyRouterConfig extends ClassifyControllerDeps {
  /** Maximum JSON request body (default: '1mb') */
  jsonBodyLimit?: string;
}

/**
 * Create an Express router with the classification endpoints.
 *
 * Routes:
 *   POST /classify_email - Mask PII in an email body and classify it
 *   GET  /health         - Readiness of the masking engine
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { createClassifyRouter } from '@mailsift/api';
 *
 * const app = express();
 * app.use(createClassifyRouter({ engine, classifier, logger }));
 * ```
 */
export function createClassifyRouter(config: ClassifyRouterConfig): Router {
  const router = Router();
  const controller = createClassifyController(config);

  router.use(json({ limit: config.jsonBodyLimit ?? '1mb' }));

  router.post('/classify_email', (req, res) => {
    controller.classifyEmail(req, res);
  });
  router.get('/health', (req, res) => {
    controller.health(req, res);
  });

  router.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    controller.handleError(err, res);
  });

  return router;
}

/** The full service: request logging in front of the classify router */
export function createApp(config: ClassifyRouterConfig): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(
    pinoHttp({
      logger: config.logger,
      customLogLevel: (_req, res, err) => responseLogLevel(res.statusCode, err),
    }),
  );
  app.use(createClassifyRouter(config));

  return app;
}

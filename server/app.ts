import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import type { ServiceConfig } from './config';
import { API_TITLE, API_VERSION, OPENAPI_PATH, createDocsRouter } from './docs';
import { createHealthRouter } from './health';
import type { Logger } from './logger';
import type { ModelHandle } from './modelHandle';
import { createRemoveBackgroundRouter } from './removeBackground';
import { requestLogger } from './requestLogger';

export interface AppDependencies {
  config: Pick<ServiceConfig, 'maxFileSize' | 'corsOrigins'>;
  model: ModelHandle;
  logger: Logger;
}

export const createApp = ({ config, model, logger }: AppDependencies) => {
  const app = express();
  app.disable('x-powered-by');

  app.use(
    cors(
      config.corsOrigins === '*'
        ? { origin: '*' }
        : { origin: config.corsOrigins, credentials: true }
    )
  );
  app.use(requestLogger(logger));

  app.get('/', (_req, res) => {
    res.json({
      name: API_TITLE,
      version: API_VERSION,
      status: model.isLoaded() ? 'running' : 'loading',
      model: model.modelName,
      supportedFormats: ['JPEG', 'PNG'],
      endpoints: {
        removeBackground: '/api/remove-bg',
        health: '/health',
        documentation: '/docs',
        redoc: '/redoc',
        openapi: OPENAPI_PATH
      }
    });
  });

  app.use(createHealthRouter(model));
  app.use('/api', createRemoveBackgroundRouter({ model, maxFileSize: config.maxFileSize, logger }));
  app.use(createDocsRouter({ maxFileSize: config.maxFileSize }));

  app.use((_req, res) => {
    res.status(404).json({ message: 'Not found' });
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    logger.error('Unhandled error', { method: req.method, path: req.originalUrl, error });
    if (res.headersSent) {
      next(error);
      return;
    }
    res.status(500).json({ message: 'Internal server error' });
  });

  return app;
};

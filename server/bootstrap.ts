import http from 'node:http';
import { createApp } from './app';
import type { ServiceConfig } from './config';
import { StartupFailureError } from './errors';
import type { Logger } from './logger';
import type { ModelHandle } from './modelHandle';

export interface ServiceDependencies {
  config: Pick<ServiceConfig, 'port' | 'host' | 'maxFileSize' | 'corsOrigins' | 'shutdownTimeoutMs'>;
  model: ModelHandle;
  logger: Logger;
  /** Called once the socket is bound, before the model has loaded. */
  onListening?: (server: http.Server) => void;
}

export interface RunningService {
  server: http.Server;
  port: number;
  shutdown: (signal?: string) => Promise<void>;
}

const listen = (server: http.Server, port: number, host: string) =>
  new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

const closeServer = (server: http.Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

/**
 * Binds the port, then loads the model. Health answers "degraded" and
 * removal answers 503 until the model is in; a failed load closes the server
 * and rejects with StartupFailureError.
 */
export const startService = async ({ config, model, logger, onListening }: ServiceDependencies): Promise<RunningService> => {
  const server = http.createServer(createApp({ config, model, logger }));
  await listen(server, config.port, config.host);

  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : config.port;
  logger.info('Listening', { host: config.host, port });
  onListening?.(server);

  try {
    await model.load();
  } catch (error) {
    logger.error('Model failed to load', { model: model.modelName, error });
    await closeServer(server);
    throw error instanceof StartupFailureError
      ? error
      : new StartupFailureError(`Failed to load model ${model.modelName}`, { cause: error });
  }
  logger.info('Ready', { model: model.modelName });

  let stopping: Promise<void> | null = null;

  const stop = async (signal?: string) => {
    logger.info('Shutting down', { signal });
    const closed = closeServer(server);
    server.closeIdleConnections();

    const timer = setTimeout(() => {
      logger.warn('Drain timeout reached, closing open connections', { timeoutMs: config.shutdownTimeoutMs });
      server.closeAllConnections();
    }, config.shutdownTimeoutMs);
    try {
      await closed;
    } finally {
      clearTimeout(timer);
    }

    await model.release();
    logger.info('Shutdown complete');
  };

  return {
    server,
    port,
    shutdown: (signal) => {
      stopping ??= stop(signal);
      return stopping;
    }
  };
};

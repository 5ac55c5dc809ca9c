import cluster from 'node:cluster';
import { startService } from './bootstrap';
import { STARTUP_FAILURE_EXIT_CODE, WORKER_READY_MESSAGE, runPrimary } from './cluster';
import { loadConfig } from './config';
import { createLogger } from './logger';
import { OnnxModelHandle } from './modelHandle';
import { ensureModelWeights } from './modelWeights';

const config = loadConfig();
const logger = createLogger(config.logLevel, { pid: process.pid });

const runWorker = async () => {
  const model = new OnnxModelHandle({
    name: config.model.name,
    maxImagePixels: config.maxImagePixels,
    logger,
    resolveWeights: () => ensureModelWeights(config.model, logger)
  });

  const service = await startService({ config, model, logger });
  process.send?.(WORKER_READY_MESSAGE);

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      service.shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed', { error });
          process.exit(1);
        }
      );
    });
  }
};

if (config.workers > 1 && cluster.isPrimary) {
  // Fetch the weights once so workers start from the cache instead of racing to download.
  ensureModelWeights(config.model, logger).then(
    async () => {
      process.exitCode = await runPrimary({ workers: config.workers, logger, cluster, signals: process });
    },
    (error: unknown) => {
      logger.error('Could not fetch model weights', { error });
      process.exit(STARTUP_FAILURE_EXIT_CODE);
    }
  );
} else {
  runWorker().catch((error: unknown) => {
    logger.error('Startup failed', { error });
    process.exit(STARTUP_FAILURE_EXIT_CODE);
  });
}

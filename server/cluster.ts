import type { Logger } from './logger';

export const STARTUP_FAILURE_EXIT_CODE = 1;
export const WORKER_READY_MESSAGE = 'worker:ready';

const FORWARDED_SIGNALS = ['SIGTERM', 'SIGINT'] as const;

/** The parts of a cluster worker the supervisor touches. */
export interface SupervisedWorker {
  readonly id: number;
  readonly process: { readonly pid?: number; kill(signal?: NodeJS.Signals): boolean };
  on(event: 'message', listener: (message: unknown) => void): unknown;
}

export interface WorkerCluster<W extends SupervisedWorker> {
  readonly workers?: NodeJS.Dict<W>;
  fork(): W;
  on(event: 'exit', listener: (worker: W, code: number, signal: string) => void): unknown;
}

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface PrimaryOptions<W extends SupervisedWorker> {
  workers: number;
  logger: Logger;
  cluster: WorkerCluster<W>;
  signals: SignalSource;
}

/**
 * Forks `workers` processes, each loading its own model copy. A worker that
 * dies after becoming ready is replaced; one that exits before becoming ready
 * takes the whole group down.
 *
 * Resolves with the exit code for the primary once every worker has stopped.
 */
export const runPrimary = <W extends SupervisedWorker>({ workers, logger, cluster, signals }: PrimaryOptions<W>) =>
  new Promise<number>((resolve) => {
    const readyWorkers = new Set<number>();
    let stopping = false;
    let exitCode = 0;

    const fork = () => {
      const worker = cluster.fork();
      worker.on('message', (message) => {
        if (message === WORKER_READY_MESSAGE) {
          readyWorkers.add(worker.id);
          logger.info('Worker ready', { workerId: worker.id, pid: worker.process.pid });
        }
      });
      return worker;
    };

    const liveWorkers = () =>
      Object.values(cluster.workers ?? {}).filter((worker): worker is W => worker !== undefined);

    const stopAll = (signal: NodeJS.Signals) => {
      stopping = true;
      const live = liveWorkers();
      if (live.length === 0) {
        resolve(exitCode);
        return;
      }
      for (const worker of live) {
        worker.process.kill(signal);
      }
    };

    cluster.on('exit', (worker, code, signal) => {
      const wasReady = readyWorkers.delete(worker.id);
      if (stopping) {
        if (liveWorkers().length === 0) {
          resolve(exitCode);
        }
        return;
      }
      if (!wasReady) {
        // A crash during startup would repeat on every refork.
        logger.error('Worker failed to start, stopping all workers', { workerId: worker.id, code, signal });
        exitCode = STARTUP_FAILURE_EXIT_CODE;
        stopAll('SIGTERM');
        return;
      }
      logger.warn('Worker exited, forking a replacement', { workerId: worker.id, code, signal });
      fork();
    });

    for (const signal of FORWARDED_SIGNALS) {
      signals.on(signal, () => {
        logger.info('Primary received signal', { signal });
        stopAll(signal);
      });
    }

    logger.info('Starting workers', { workers });
    for (let i = 0; i < workers; i += 1) {
      fork();
    }
  });

/**
 * Server Entry Point — Clustering & Graceful Shutdown
 * Layer: Entry Point
 *
 * The primary process forks one worker per CPU (or WEB_CONCURRENCY) and
 * replaces any that die; workers share the port and each runs its own app,
 * and with it its own buffer pool.
 *
 * On SIGTERM/SIGINT a worker stops accepting connections, lets in-flight
 * requests finish (their traffic events included), then exits.
 */
import cluster from 'node:cluster';
import os from 'node:os';

import { config } from '@core/config';
import { logger } from '@core/logger';
import { createApp } from '@interfaces/http/app';

const numWorkers = config.cluster.workers || os.cpus().length;

if (cluster.isPrimary) {
  logger.info(
    { pid: process.pid, workers: numWorkers, capture: config.capture },
    `Primary process starting >> forking ${numWorkers} workers`,
  );

  for (let i = 0; i < numWorkers; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    logger.warn({ pid: worker.process.pid, code, signal }, 'Worker died — restarting');
    cluster.fork();
  });
} else {
  const app = createApp();

  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Worker listening on :${config.port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
    server.close((err) => {
      if (err) {
        logger.error({ err }, 'Server close failed');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

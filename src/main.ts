#!/usr/bin/env node
/**
 * Webhook entry point.
 *
 * Reads the process settings once, connects to the cluster and serves the
 * OVH solver under `GROUP_NAME`.
 */
import { KubeConfig } from '@kubernetes/client-node';
import { logger, setLogLevel } from './logger.js';
import { ovhSolver } from './ovh-solver.js';
import { startServer } from './server.js';
import { loadSettings } from './settings.js';

async function main(): Promise<void> {
  const settings = loadSettings();
  setLogLevel(settings.logLevel);

  const kubeConfig = new KubeConfig();
  kubeConfig.loadFromDefault();

  // More solvers may be served side by side; name() tells them apart
  const solvers = [ovhSolver()];
  for (const solver of solvers) {
    solver.initialize(kubeConfig);
  }

  const server = await startServer(settings, solvers, logger);

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close((err) => {
      if (err) {
        logger.error({ err }, 'Error while closing server');
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start webhook');
  process.exit(1);
});

import express, { type Express } from 'express';
import type { Server } from 'http';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getContentType, getMetrics } from '../utils/metrics.js';
import { createHealthRouter, type HealthCheckDependencies } from './routes/health.js';

const log = logger('ApiServer');

/**
 * Monitoring surface: GET /health and GET /metrics
 */
export function createApiServer(deps: HealthCheckDependencies): Express {
  const app = express();

  app.use('/health', createHealthRouter(deps));

  app.get('/metrics', async (_req, res) => {
    try {
      const metrics = await getMetrics();
      res.set('Content-Type', getContentType());
      res.send(metrics);
    } catch (error) {
      res.status(500).send(`Error collecting metrics: ${error instanceof Error ? error.message : String(error)}`);
    }
  });

  return app;
}

/**
 * Listen on `port`. Rejects when the port cannot be bound; errors after that are logged.
 */
export function startApiServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);

    const onStartupError = (error: Error) => reject(error);
    server.once('error', onStartupError);
    server.once('listening', () => {
      server.off('error', onStartupError);
      server.on('error', (error: Error) => {
        log.error('Monitoring server error', { reason: errorMessage(error) });
      });
      resolve(server);
    });
  });
}

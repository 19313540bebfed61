import MetricsController from 'App/controllers/MetricsController';
import type { Logger } from 'App/logger';
import { createErrorHandler } from 'App/middlewares/errorHandler';
import { createMetricsRoutes } from 'App/routes/metricsRoutes';
import type MetricsSampler from 'App/services/MetricsSampler';
import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
// ------------------------------------------------------------------------------

export interface MonitorAppOptions {
  sampler: MetricsSampler;
  logger: Logger;
  mode?: string;
}

/**
 * Read-only HTTP view of the metrics sampler.
 */
export function createMonitorApp({
  sampler,
  logger,
  mode = process.env.NODE_ENV ?? 'development',
}: MonitorAppOptions): Express {
  const app = express();

  if (mode === 'production') {
    app.disable('x-powered-by');
    app.use(helmet());
    // adding morgan to log HTTP requests
    app.use(
      morgan('common', {
        stream: { write: line => logger.info(line.trim()) },
      }),
    );
  }

  app.get('/health', (req, res) => {
    res.json({ status: 'ok', activeSessions: sampler.listActiveSessions().length });
  });

  app.use('/', createMetricsRoutes(new MetricsController(sampler)));

  app.use(createErrorHandler(logger));

  return app;
}

export default createMonitorApp;

import type { Logger } from 'App/logger';
import type MetricsSampler from 'App/services/MetricsSampler';
import http from 'node:http';
import { createMonitorApp } from './server';

/**
 * Serves the metrics monitor on `port` and resolves once it is listening.
 */
export const startMonitorServer = (
  sampler: MetricsSampler,
  port: number,
  logger: Logger,
): Promise<http.Server> => {
  const server = http.createServer(createMonitorApp({ sampler, logger }));
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      logger.info(`Metrics monitor listening on port ${port}`);
      resolve(server);
    });
  });
};

export const stopMonitorServer = (server: http.Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });

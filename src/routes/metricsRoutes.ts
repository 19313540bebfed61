// src/routes/metricsRoutes.ts
import type MetricsController from 'App/controllers/MetricsController';
import { Router } from 'express';

export function createMetricsRoutes(controller: MetricsController): Router {
  const metricsRoutes = Router();

  metricsRoutes.get('/api/metrics/sessions', controller.sessions);
  metricsRoutes.get('/api/metrics/:nodeName/summary', controller.summary);
  metricsRoutes.get('/api/metrics/:nodeName/snapshots', controller.snapshots);

  return metricsRoutes;
}

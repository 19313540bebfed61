// src/controllers/MetricsController.ts
import { NotFoundError } from 'App/errors/CustomError';
import type MetricsSampler from 'App/services/MetricsSampler';
import { NextFunction, Request, Response } from 'express';

class MetricsController {
  constructor(private readonly sampler: MetricsSampler) {}

  /**
   * GET /api/metrics/sessions
   * Names of nodes with an active sampling loop.
   */
  sessions = (req: Request, res: Response, next: NextFunction) => {
    try {
      const active = this.sampler.listActiveSessions();
      return res.status(200).json({ success: true, data: active });
    } catch (err) {
      return next(err);
    }
  };

  /**
   * GET /api/metrics/:nodeName/summary
   * Zero-value summary for names without data.
   */
  summary = (req: Request, res: Response, next: NextFunction) => {
    try {
      const { nodeName } = req.params;
      const summary = this.sampler.getSummary(nodeName);
      return res.status(200).json({ success: true, data: summary });
    } catch (err) {
      return next(err);
    }
  };

  /**
   * GET /api/metrics/:nodeName/snapshots
   */
  snapshots = (req: Request, res: Response, next: NextFunction) => {
    try {
      const { nodeName } = req.params;
      if (!this.sampler.hasData(nodeName)) {
        throw new NotFoundError(`No metrics data for ${nodeName}`);
      }
      return res
        .status(200)
        .json({ success: true, data: this.sampler.getSnapshots(nodeName) });
    } catch (err) {
      return next(err);
    }
  };
}

export default MetricsController;

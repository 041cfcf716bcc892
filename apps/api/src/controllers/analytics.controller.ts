import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AverageQuery, StationServicePort } from '@weather-station/domain';

const averageQuerySchema = z.object({
  from: z.string().datetime({ offset: true }).optional(),
  to: z.string().datetime({ offset: true }).optional(),
  minutes: z.coerce.number().int().min(1).max(7 * 24 * 60).optional(),
  sensorId: z.string().min(1).optional(),
});

export function analyticsRouter(service: StationServicePort): Router {
  const router = Router();

  /** GET /api/analytics/average: cache-first average over a window (default: last hour) */
  router.get('/average', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = averageQuerySchema.parse(req.query);
      const query: AverageQuery = {};
      if (params.from) query.start = new Date(params.from);
      if (params.to) query.end = new Date(params.to);
      if (params.minutes !== undefined) query.windowMs = params.minutes * 60_000;
      if (params.sensorId) query.sensorId = params.sensorId;

      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) controller.abort(new Error('client disconnected'));
      });

      const result = await service.queryAverage(query, { signal: controller.signal });
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}

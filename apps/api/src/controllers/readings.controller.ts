import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { StationServicePort } from '@weather-station/domain';
import { RECENT_LIMIT_MAX } from '../services/readings/reading.schema.js';

const ingestBodySchema = z.object({
  temperature: z.number(),
  sensorId: z.string(),
  ts: z.string().optional(),
});

const recentQuerySchema = z.object({
  limit: z.coerce.number().int().min(0).max(RECENT_LIMIT_MAX).default(10),
});

export function readingsRouter(service: StationServicePort): Router {
  const router = Router();

  /** POST /api/readings: persist one reading, then cache it */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = ingestBodySchema.parse(req.body);
      const reading = await service.ingest(body);
      res.status(201).json({ data: reading });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/readings/recent: readings this process has handled, newest first (empty after a restart) */
  router.get('/recent', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = recentQuerySchema.parse(req.query);
      const data = service.recent(limit);
      res.json({ data, total: data.length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

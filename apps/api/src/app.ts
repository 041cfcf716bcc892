import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import { readingsRouter } from './controllers/readings.controller.js';
import { analyticsRouter } from './controllers/analytics.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import type { StationContext } from './context.js';

export function buildApp(ctx: StationContext): ReturnType<typeof express> {
  const app = express();
  const { service } = ctx;

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: ctx.config.corsOrigin }));
  app.use(morgan('combined', { skip: () => process.env['NODE_ENV'] === 'test' }));
  app.use(express.json({ limit: '100kb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/readings', readingsRouter(service));
  app.use('/api/analytics', analyticsRouter(service));

  app.get('/api/status', async (_req, res, next) => {
    try {
      res.json(await service.status());
    } catch (err) {
      next(err);
    }
  });

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: ctx.clock.now().toISOString(),
      ...service.health(),
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

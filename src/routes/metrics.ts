import { Router } from 'express';
import { z } from 'zod';

import type { QuestionMonitor } from '../quality/monitor';

const logsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export const createMetricsRouter = (monitor: QuestionMonitor): Router => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json(monitor.getMetrics());
  });

  router.get('/logs', async (req, res, next) => {
    const query = logsQuerySchema.safeParse(req.query);

    if (!query.success) {
      res.status(400).json({ error: 'limit must be an integer between 1 and 100' });
      return;
    }

    try {
      res.json({ logs: await monitor.getRecentLogs(query.data.limit) });
    } catch (error) {
      next(error);
    }
  });

  return router;
};

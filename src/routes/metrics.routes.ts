import { Router } from 'express';
import { logger } from '../core/logger';
import { metrics } from '../utils/metrics';

const router = Router();

router.get('/', (req, res) => {
  logger.debug({ req: { id: req.id } }, 'Metrics requested');
  res.json({
    success: true,
    data: {
      ...metrics.getMetrics(),
      system: {
        uptime: process.uptime(),
        memoryUsage: process.memoryUsage(),
        timestamp: new Date().toISOString(),
      },
    },
  });
});

export { router as metricsRoutes };

import { Router } from 'express';
import { logger } from '../core/logger';
import { InventoryEngine } from '../services/inventory.service';

export function createHealthRoutes(engine: InventoryEngine): Router {
  const router = Router();

  // Store reachability check
  router.get('/', async (req, res) => {
    try {
      await engine.ping();
      logger.debug({ req: { id: req.id } }, 'Health check passed');
      res.json({
        success: true,
        message: 'healthy endpoint',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      });
    } catch (error) {
      logger.error({ req: { id: req.id }, error }, 'Health check ping failed');
      res.status(503).json({
        success: false,
        message: 'unhealthy endpoint',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Liveness check: the process answers, store not consulted
  router.get('/liveness', (req, res) => {
    logger.debug({ req: { id: req.id } }, 'Liveness check requested');
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  return router;
}

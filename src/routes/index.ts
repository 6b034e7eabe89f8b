import { Router } from 'express';
import type { HealthCheckResponse } from '../types/api.types';
import type { AppContainer } from '../container';
import { authenticate } from '../middleware/auth.middleware';
import { createItemsRouter } from './v1/items.routes';
import { createBorrowersRouter } from './v1/borrowers.routes';
import { createBorrowsRouter } from './v1/borrows.routes';
import {
  createKioskRouter,
  createPendingReturnsRouter,
  createReturnsRouter,
} from './v1/returns.routes';
import { createTransactionsRouter } from './v1/transactions.routes';
import { createReportsRouter } from './v1/reports.routes';
import { createAdminsRouter, createAuthRouter } from './v1/auth.routes';

/**
 * API Routes Aggregator
 */
export function createRoutes(container: AppContainer): Router {
  const router = Router();
  const { controllers } = container;

  /**
   * @swagger
   * /health:
   *   get:
   *     summary: Liveness check
   *     tags: [System]
   *     responses:
   *       200:
   *         description: Service is up
   */
  router.get('/health', (_req, res) => {
    const health: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
    res.status(200).json(health);
  });

  // API version info
  router.get('/v1', (_req, res) => {
    res.status(200).json({
      version: '1.0.0',
      api: 'Lab Equipment Desk API',
    });
  });

  // Public
  router.use('/v1/auth', createAuthRouter(controllers.auth));

  // Everything below needs a staff session
  const requireAuth = authenticate(container.authService);

  router.use('/v1/admins', requireAuth, createAdminsRouter(controllers.auth));
  router.use('/v1/items', requireAuth, createItemsRouter(controllers.items));
  router.use('/v1/borrowers', requireAuth, createBorrowersRouter(controllers.borrowers));
  router.use('/v1/borrows', requireAuth, createBorrowsRouter(controllers.borrows));
  router.use('/v1/returns', requireAuth, createReturnsRouter(controllers.returns));
  router.use('/v1/kiosk', requireAuth, createKioskRouter(controllers.returns));
  router.use('/v1/pending-returns', requireAuth, createPendingReturnsRouter(controllers.returns));
  router.use('/v1/transactions', requireAuth, createTransactionsRouter(controllers.transactions));
  router.use('/v1/reports', requireAuth, createReportsRouter(controllers.reports));

  return router;
}

/**
 * Ledger API Routes
 *
 * Provides endpoints for:
 * - The committed notification log
 * - The conservation audit
 */

import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth/auth.middleware';
import { validateRequest } from '../../middlewares/validateRequest';

import { LedgerController } from './ledger.controller';
import { LedgerService } from './ledger.service';
import { notificationsQueryValidation } from './ledger.validation';

export const createLedgerRoutes = (service: LedgerService): Router => {
  const router = Router();
  const ledgerController = new LedgerController(service);

  router.use(authMiddleware);

  /**
   * GET /ledger/notifications
   * Query: eventType, contract, fromSequence, limit
   */
  router.get(
    '/notifications',
    notificationsQueryValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      ledgerController.getNotifications(req, res, next)
  );

  /**
   * GET /ledger/conservation
   */
  router.get('/conservation', (req: Request, res: Response, next: NextFunction) =>
    ledgerController.getConservation(req, res, next)
  );

  return router;
};

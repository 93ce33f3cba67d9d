/**
 * Legacy Token API Routes
 */

import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth/auth.middleware';
import { ledgerCallLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';
import { LedgerService } from '../ledger/ledger.service';
import { addressBody, addressParam, amountBody } from '../ledger/ledger.validation';

import { LegacyController } from './legacy.controller';

export const createLegacyRoutes = (service: LedgerService): Router => {
  const router = Router();
  const legacyController = new LegacyController(service);

  router.use(authMiddleware);
  router.use(ledgerCallLimiter);

  router.get('/', (req: Request, res: Response, next: NextFunction) => legacyController.getLegacyToken(req, res, next));

  router.get('/balances/:account', addressParam('account'), validateRequest, (req: Request, res: Response, next: NextFunction) =>
    legacyController.getBalance(req, res, next)
  );

  router.post('/mint', addressBody('to'), amountBody(), validateRequest, (req: Request, res: Response, next: NextFunction) =>
    legacyController.mint(req, res, next)
  );

  router.post('/approve', addressBody('spender'), amountBody(), validateRequest, (req: Request, res: Response, next: NextFunction) =>
    legacyController.approve(req, res, next)
  );

  return router;
};

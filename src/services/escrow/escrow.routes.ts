/**
 * Escrow API Routes
 */

import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth/auth.middleware';
import { ledgerCallLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';
import { LedgerService } from '../ledger/ledger.service';

import { EscrowController } from './escrow.controller';
import {
  addressChangeValidation,
  disburseValidation,
  fundValidation,
  ownershipValidation,
  userBalanceValidation,
} from './escrow.validation';

export const createEscrowRoutes = (service: LedgerService): Router => {
  const router = Router();
  const escrowController = new EscrowController(service);

  router.use(authMiddleware);
  router.use(ledgerCallLimiter);

  router.get('/', (req: Request, res: Response, next: NextFunction) => escrowController.getEscrow(req, res, next));

  router.get('/users/:userId/balance', userBalanceValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    escrowController.getUserBalance(req, res, next)
  );

  router.post('/users/:userId/fund', fundValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    escrowController.fundUser(req, res, next)
  );

  router.post('/users/:userId/disburse', disburseValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    escrowController.disburseFunds(req, res, next)
  );

  router.put('/disbursal-address', addressChangeValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    escrowController.changeDisbursalAddress(req, res, next)
  );

  router.put('/token-address', addressChangeValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    escrowController.changeRenderTokenAddress(req, res, next)
  );

  router.put('/owner', ownershipValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    escrowController.transferOwnership(req, res, next)
  );

  router.delete('/owner', (req: Request, res: Response, next: NextFunction) => escrowController.renounceOwnership(req, res, next));

  return router;
};

/**
 * Token API Routes
 *
 * Every route runs as the address in the caller's bearer token.
 */

import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth/auth.middleware';
import { ledgerCallLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';
import { LedgerService } from '../ledger/ledger.service';

import { TokenController } from './token.controller';
import {
  addressChangeValidation,
  allowanceChangeValidation,
  allowanceValidation,
  balanceValidation,
  depositValidation,
  holdInEscrowValidation,
  ownershipValidation,
  transferFromValidation,
  transferValidation,
  withdrawValidation,
} from './token.validation';

export const createTokenRoutes = (service: LedgerService): Router => {
  const router = Router();
  const tokenController = new TokenController(service);

  router.use(authMiddleware);
  router.use(ledgerCallLimiter);

  // Reads
  router.get('/', (req: Request, res: Response, next: NextFunction) => tokenController.getToken(req, res, next));

  router.get('/balances/:account', balanceValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    tokenController.getBalance(req, res, next)
  );

  router.get('/allowances/:owner/:spender', allowanceValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    tokenController.getAllowance(req, res, next)
  );

  // Balances and allowances
  router.post('/transfer', transferValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    tokenController.transfer(req, res, next)
  );

  router.post('/approve', allowanceChangeValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    tokenController.approve(req, res, next)
  );

  router.post('/increase-allowance', allowanceChangeValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    tokenController.increaseAllowance(req, res, next)
  );

  router.post('/decrease-allowance', allowanceChangeValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    tokenController.decreaseAllowance(req, res, next)
  );

  router.post('/transfer-from', transferFromValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    tokenController.transferFrom(req, res, next)
  );

  // Escrow
  router.post('/escrow', holdInEscrowValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    tokenController.holdInEscrow(req, res, next)
  );

  // Bridge and migration
  router.post('/deposit', depositValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    tokenController.deposit(req, res, next)
  );

  router.post('/withdraw', withdrawValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    tokenController.withdraw(req, res, next)
  );

  router.post('/migrate', (req: Request, res: Response, next: NextFunction) => tokenController.migrate(req, res, next));

  // Administration
  router.put('/escrow-address', addressChangeValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    tokenController.setEscrowContractAddress(req, res, next)
  );

  router.put('/bridge-manager', addressChangeValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    tokenController.updateBridgeManager(req, res, next)
  );

  router.put('/owner', ownershipValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    tokenController.transferOwnership(req, res, next)
  );

  router.delete('/owner', (req: Request, res: Response, next: NextFunction) => tokenController.renounceOwnership(req, res, next));

  return router;
};
